import { describe, it, expect } from 'vitest';
import { ConfigValidationError, SiteConflictError, UnknownSiteError } from '../errors';
import { addSite, setSiteDebug } from '../sites';
import type { EnvironmentConfig } from '../schema';

const HOME = '/home/dev';

function makeConfig(): EnvironmentConfig {
  return {
    databases: [],
    services: { mailhog: false, redis: false, minio: false, dynamodb: false },
    sites: [{ hostname: 'a.test', aliases: ['www.a.test'], runtime: '8.2', path: '~/code/a' }],
  };
}

describe('addSite', () => {
  it('should append the site to a copy of the config', () => {
    const config = makeConfig();

    const next = addSite(config, { hostname: 'b.test', runtime: '7.4', path: '~/code/b' }, HOME);

    expect(next.sites.map((s) => s.hostname)).toEqual(['a.test', 'b.test']);
    expect(config.sites).toHaveLength(1);
  });

  it('should reject a hostname that is already an alias', () => {
    expect(() => addSite(makeConfig(), { hostname: 'www.a.test', runtime: '8.2', path: '~/code/b' }, HOME)).toThrow(
      new SiteConflictError('hostname www.a.test already exists')
    );
  });

  it('should reject an alias that is already a hostname', () => {
    const site = { hostname: 'b.test', aliases: ['a.test'], runtime: '8.2', path: '~/code/b' };

    expect(() => addSite(makeConfig(), site, HOME)).toThrow('hostname a.test already exists');
  });

  it('should reject a path another site resolves to', () => {
    const site = { hostname: 'b.test', runtime: '8.2', path: '/home/dev/code/a/' };

    expect(() => addSite(makeConfig(), site, HOME)).toThrow(
      'site path /home/dev/code/a already exists (used by a.test)'
    );
  });

  it('should validate the new site', () => {
    expect(() => addSite(makeConfig(), { hostname: 'b.test', runtime: '', path: '~/code/b' }, HOME)).toThrow(
      ConfigValidationError
    );
  });
});

describe('setSiteDebug', () => {
  it('should switch debugging for one site', () => {
    const config = makeConfig();

    const next = setSiteDebug(config, 'a.test', true);

    expect(next.sites[0].debug).toBe(true);
    expect(config.sites[0].debug).toBeUndefined();
  });

  it('should not match a site by alias', () => {
    expect(() => setSiteDebug(makeConfig(), 'www.a.test', true)).toThrow(new UnknownSiteError('www.a.test'));
  });

  it('should name the unknown site', () => {
    expect(() => setSiteDebug(makeConfig(), 'c.test', false)).toThrow('unknown site c.test');
  });
});
