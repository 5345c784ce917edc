import { describe, it, expect } from 'vitest';
import type { EnvironmentConfig } from '@berth/config';
import {
  DEBUG_OFF,
  DEBUG_ON,
  generateDatabase,
  generateNetwork,
  generateProxy,
  generateService,
  generateSite,
} from '../generators/docker';
import { Labels } from '../labels';

const HOME = '/home/dev';

function makeConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return {
    databases: [],
    services: { mailhog: false, redis: false, minio: false, dynamodb: false },
    sites: [],
    ...overrides,
  };
}

// ============================================================================
// Databases
// ============================================================================

describe('generateDatabase', () => {
  it('should pair a volume and container named after the hostname', () => {
    const { hostname, volume, container } = generateDatabase('dev', { engine: 'mysql', version: '8.0', port: '3307' });

    expect(hostname).toBe('mysql-8.0-3307');
    expect(volume.name).toBe('mysql-8.0-3307');
    expect(container.name).toBe('mysql-8.0-3307');
    expect(container.image).toBe('docker.io/library/mysql:8.0');
    expect(container.mounts).toEqual([{ type: 'volume', source: 'mysql-8.0-3307', target: '/var/lib/mysql' }]);
    expect(container.networkAliases).toEqual(['mysql-8.0-3307']);
  });

  it('should publish the engine port on the declared loopback port', () => {
    const { container } = generateDatabase('dev', { engine: 'postgres', version: '12', port: '5433' });

    expect(container.ports).toEqual([{ containerPort: 5432, hostPort: 5433, protocol: 'tcp', hostIp: '127.0.0.1' }]);
    expect(container.mounts[0].target).toBe('/var/lib/postgresql/data');
    expect(container.env).toContain('POSTGRES_DB=berth');
  });

  it('should label mariadb as mysql compatible', () => {
    const { container } = generateDatabase('dev', { engine: 'mariadb', version: '10.6', port: '3306' });

    expect(container.labels).toEqual({
      [Labels.environment]: 'dev',
      [Labels.type]: 'database',
      [Labels.databaseEngine]: 'mariadb',
      [Labels.databaseVersion]: '10.6',
      [Labels.managed]: 'true',
      [Labels.databasePort]: '3306',
      [Labels.databaseCompatibility]: 'mysql',
    });
    expect(container.env).toContain('MYSQL_DATABASE=berth');
  });
});

// ============================================================================
// Services
// ============================================================================

describe('generateService', () => {
  it('should generate mailhog with both ports on loopback', () => {
    const spec = generateService('dev', 'mailhog');

    expect(spec.name).toBe('dev-mailhog');
    expect(spec.ports.map((p) => p.containerPort)).toEqual([1025, 8025]);
    expect(spec.ports.every((p) => p.hostIp === '127.0.0.1')).toBe(true);
    expect(spec.mounts).toEqual([]);
    expect(spec.cmd).toBeUndefined();
  });

  it('should back service data with an anonymous volume', () => {
    const spec = generateService('dev', 'minio');

    expect(spec.mounts).toEqual([{ type: 'volume', source: '', target: '/data' }]);
    expect(spec.cmd).toEqual(['server', '/data', '--console-address', ':9001']);
    expect(spec.labels[Labels.service]).toBe('minio');
  });
});

// ============================================================================
// Sites
// ============================================================================

describe('generateSite', () => {
  it('should mount the site root and extra mounts', () => {
    const config = makeConfig();
    const spec = generateSite(
      { hostname: 'a.test', runtime: '8.2', path: '~/code/a', mounts: [{ source: 'shared', target: '/shared' }] },
      { environment: 'dev', home: HOME, config }
    );

    expect(spec.mounts).toEqual([
      { type: 'bind', source: '/home/dev/code/a', target: '/app' },
      { type: 'bind', source: '/home/dev/shared', target: '/shared' },
    ]);
  });

  it('should map every hostname to loopback inside the container', () => {
    const spec = generateSite(
      { hostname: 'a.test', aliases: ['www.a.test'], runtime: '8.2', path: '/srv/a' },
      { environment: 'dev', home: HOME, config: makeConfig() }
    );

    expect(spec.extraHosts).toEqual(['a.test:127.0.0.1', 'www.a.test:127.0.0.1']);
    expect(spec.name).toBe('a.test');
    expect(spec.labels[Labels.host]).toBe('a.test');
  });

  it('should end the env with the debug flag', () => {
    const config = makeConfig({ env: { APP_ENV: 'local' } });
    const on = generateSite({ hostname: 'a.test', runtime: '8.2', path: 'a', debug: true }, { environment: 'dev', home: HOME, config });
    const off = generateSite({ hostname: 'b.test', runtime: '8.2', path: 'b' }, { environment: 'dev', home: HOME, config });

    expect(on.env.slice(-2)).toEqual(['APP_ENV=local', DEBUG_ON]);
    expect(off.env[off.env.length - 1]).toBe(DEBUG_OFF);
  });

  it('should build each site env independently', () => {
    const config = makeConfig();
    const a = generateSite({ hostname: 'a.test', runtime: '8.2', path: 'a' }, { environment: 'dev', home: HOME, config });
    const b = generateSite({ hostname: 'b.test', runtime: '8.2', path: 'b' }, { environment: 'dev', home: HOME, config });

    expect(b.env).toEqual(a.env);
    expect(a.env).toHaveLength(10);
  });

  it('should use the configured site image template', () => {
    const spec = generateSite(
      { hostname: 'a.test', runtime: '8.3', path: 'a' },
      { environment: 'dev', home: HOME, config: makeConfig({ siteImage: 'registry.test/web:{version}' }) }
    );

    expect(spec.image).toBe('registry.test/web:8.3');
  });
});

// ============================================================================
// Network and proxy
// ============================================================================

describe('generateProxy', () => {
  it('should name the proxy and network after the environment', () => {
    const proxy = generateProxy('dev');

    expect(generateNetwork('dev').name).toBe('dev');
    expect(proxy.name).toBe('dev');
    expect(proxy.ports.map((p) => p.hostPort)).toEqual([80, 443, 5000]);
    expect(proxy.labels[Labels.proxy]).toBe('dev');
  });
});
