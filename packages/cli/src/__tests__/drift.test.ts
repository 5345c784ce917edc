import { describe, it, expect } from 'vitest';
import type { ContainerSpec } from '../generators/docker';
import { Labels } from '../labels';
import { classifyDrift, existenceOnly, siteDrift } from '../services/drift.service';
import type { ContainerDetails, ContainerHandle } from '../services/runtime.service';

function handle(name: string, state = 'running'): ContainerHandle {
  return { id: `id-${name}`, name, image: 'web:8.2', state, labels: {} };
}

const desired: ContainerSpec = {
  name: 'a.test',
  image: 'web:8.2',
  labels: {},
  env: ['RUNTIME_MEMORY_LIMIT=512M', 'DEBUG_MODE=off'],
  ports: [],
  mounts: [
    { type: 'bind', source: '/srv/a', target: '/app' },
    { type: 'bind', source: '/srv/shared', target: '/shared' },
  ],
  extraHosts: ['a.test:127.0.0.1', 'www.a.test:127.0.0.1'],
  networkAliases: [],
};

function details(overrides: Partial<ContainerDetails> = {}): ContainerDetails {
  return {
    id: 'id-a.test',
    name: 'a.test',
    image: 'web:8.2',
    labels: { [Labels.envKeys]: 'DEBUG_MODE,RUNTIME_MEMORY_LIMIT' },
    env: ['PATH=/usr/bin', 'RUNTIME_MEMORY_LIMIT=512M', 'DEBUG_MODE=off'],
    mounts: [
      { type: 'bind', source: '/srv/shared', target: '/shared' },
      { type: 'bind', source: '/srv/a', target: '/app' },
    ],
    extraHosts: ['www.a.test:127.0.0.1', 'a.test:127.0.0.1'],
    ...overrides,
  };
}

describe('classifyDrift', () => {
  it('should report absent without matches', async () => {
    expect(await classifyDrift('a.test', [], existenceOnly)).toEqual({ kind: 'absent' });
  });

  it('should tell running and stopped matches apart', async () => {
    const running = handle('a.test');
    const stopped = handle('a.test', 'exited');

    expect(await classifyDrift('a.test', [running], existenceOnly)).toEqual({ kind: 'running-matching', container: running });
    expect(await classifyDrift('a.test', [stopped], existenceOnly)).toEqual({ kind: 'stopped-matching', container: stopped });
  });

  it('should carry the reasons and running flag of a mismatch', async () => {
    const stopped = handle('a.test', 'exited');

    const state = await classifyDrift('a.test', [stopped], async () => ['image changed']);

    expect(state).toEqual({ kind: 'mismatched', container: stopped, running: false, reasons: ['image changed'] });
  });

  it('should refuse more than one match', async () => {
    await expect(classifyDrift('redis', [handle('dev-redis'), handle('old-redis')], existenceOnly)).rejects.toThrow(
      'found 2 containers for redis (dev-redis, old-redis); remove the extra containers and re-run'
    );
  });
});

describe('siteDrift', () => {
  it('should match regardless of mount and host order', () => {
    expect(siteDrift(desired, details())).toEqual([]);
  });

  it('should report a changed image', () => {
    expect(siteDrift(desired, details({ image: 'web:7.4' }))).toEqual(['image is web:7.4, expected web:8.2']);
  });

  it('should report a removed mount', () => {
    const reasons = siteDrift(desired, details({ mounts: [{ type: 'bind', source: '/srv/a', target: '/app' }] }));

    expect(reasons).toEqual(['mounted paths changed']);
  });

  it('should report a mount moved to another target', () => {
    const mounts = [
      { type: 'bind' as const, source: '/srv/a', target: '/app' },
      { type: 'bind' as const, source: '/srv/shared', target: '/elsewhere' },
    ];

    expect(siteDrift(desired, details({ mounts }))).toEqual(['mounted paths changed']);
  });

  it('should ignore volume mounts the image declares', () => {
    const mounts = [...details().mounts, { type: 'volume' as const, source: 'abc123', target: '/tmp' }];

    expect(siteDrift(desired, details({ mounts }))).toEqual([]);
  });

  it('should report a new alias', () => {
    expect(siteDrift(desired, details({ extraHosts: ['a.test:127.0.0.1'] }))).toEqual(['hostnames changed']);
  });

  it('should name the env variables that changed', () => {
    const reasons = siteDrift(desired, details({ env: ['RUNTIME_MEMORY_LIMIT=1G', 'DEBUG_MODE=off'] }));

    expect(reasons).toEqual(['environment changed (RUNTIME_MEMORY_LIMIT)']);
  });

  it('should report a variable removed from the config', () => {
    const reasons = siteDrift(
      desired,
      details({
        labels: { [Labels.envKeys]: 'DEBUG_MODE,FOO,RUNTIME_MEMORY_LIMIT' },
        env: ['RUNTIME_MEMORY_LIMIT=512M', 'DEBUG_MODE=off', 'FOO=bar'],
      })
    );

    expect(reasons).toEqual(['environment changed (FOO)']);
  });

  it('should only compare env presence on containers without the env keys label', () => {
    expect(siteDrift(desired, details({ labels: {}, env: ['RUNTIME_MEMORY_LIMIT=512M', 'DEBUG_MODE=off', 'FOO=bar'] }))).toEqual([]);
  });
});
