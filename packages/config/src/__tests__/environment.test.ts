import { describe, it, expect } from 'vitest';
import {
  allHostnames,
  asEnvs,
  databaseHostname,
  siteImage,
  siteImageFor,
  siteMountPaths,
  siteRootPath,
} from '../environment';
import type { EnvironmentConfig, SiteConfig } from '../schema';

const HOME = '/home/dev';

function makeConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return {
    databases: [],
    services: { mailhog: false, redis: false, minio: false, dynamodb: false },
    sites: [],
    ...overrides,
  };
}

describe('databaseHostname', () => {
  it('should join engine, version and port', () => {
    expect(databaseHostname({ engine: 'mysql', version: '8.0', port: '3306' })).toBe('mysql-8.0-3306');
  });

  it('should throw when the port is missing', () => {
    expect(() => databaseHostname({ engine: 'postgres', version: '12', port: '' })).toThrow(
      'database engine, version and port are required'
    );
  });
});

describe('siteImage', () => {
  it('should substitute the runtime version', () => {
    expect(siteImage('docker.io/example/web:{version}-dev', '8.2')).toBe('docker.io/example/web:8.2-dev');
  });

  it('should use the default template', () => {
    const site: SiteConfig = { hostname: 'a.test', runtime: '8.1', path: 'a' };

    expect(siteImageFor(makeConfig(), site)).toBe('docker.io/berthdev/web:8.1-dev');
  });
});

describe('site paths', () => {
  it('should expand the home directory', () => {
    expect(siteRootPath({ hostname: 'a.test', runtime: '8.2', path: '~/dev/a' }, HOME)).toBe('/home/dev/dev/a');
  });

  it('should resolve relative paths from home', () => {
    expect(siteRootPath({ hostname: 'a.test', runtime: '8.2', path: 'sites/a' }, HOME)).toBe('/home/dev/sites/a');
  });

  it('should normalize absolute paths', () => {
    expect(siteRootPath({ hostname: 'a.test', runtime: '8.2', path: '/srv/a/' }, HOME)).toBe('/srv/a');
  });

  it('should key extra mounts by absolute source', () => {
    const mounts = siteMountPaths(
      {
        hostname: 'a.test',
        runtime: '8.2',
        path: 'a',
        mounts: [
          { source: '~/shared', target: '/shared' },
          { source: '/opt/cache', target: '/cache' },
        ],
      },
      HOME
    );

    expect([...mounts.entries()]).toEqual([
      ['/home/dev/shared', '/shared'],
      ['/opt/cache', '/cache'],
    ]);
  });
});

describe('allHostnames', () => {
  it('should list each hostname followed by its aliases', () => {
    const config = makeConfig({
      sites: [
        { hostname: 'a.test', aliases: ['www.a.test'], runtime: '8.2', path: 'a' },
        { hostname: 'b.test', runtime: '8.2', path: 'b' },
      ],
    });

    expect(allHostnames(config)).toEqual(['a.test', 'www.a.test', 'b.test']);
  });
});

describe('asEnvs', () => {
  it('should materialize defaults', () => {
    expect(asEnvs(makeConfig())).toEqual([
      'RUNTIME_DISPLAY_ERRORS=on',
      'RUNTIME_MAX_EXECUTION_TIME=5000',
      'RUNTIME_MAX_INPUT_VARS=5000',
      'RUNTIME_MAX_INPUT_TIME=-1',
      'RUNTIME_MEMORY_LIMIT=512M',
      'RUNTIME_UPLOAD_MAX_FILESIZE=512M',
      'RUNTIME_POST_MAX_SIZE=512M',
      'RUNTIME_OPCACHE_ENABLE=0',
      'RUNTIME_OPCACHE_REVALIDATE_FREQ=0',
    ]);
  });

  it('should apply overrides and append custom env sorted by key', () => {
    const envs = asEnvs(
      makeConfig({
        runtime: { displayErrors: false, memoryLimit: '1G', opcacheEnable: true },
        env: { ZED: 'last', APP_ENV: 'dev' },
      })
    );

    expect(envs[0]).toBe('RUNTIME_DISPLAY_ERRORS=off');
    expect(envs[4]).toBe('RUNTIME_MEMORY_LIMIT=1G');
    expect(envs[7]).toBe('RUNTIME_OPCACHE_ENABLE=1');
    expect(envs.slice(9)).toEqual(['APP_ENV=dev', 'ZED=last']);
  });
});
