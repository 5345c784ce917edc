/**
 * Site container generator
 */

import {
  asEnvs,
  siteHostnames,
  siteImageFor,
  siteMountPaths,
  siteRootPath,
  type EnvironmentConfig,
  type SiteConfig,
} from '@berth/config';
import { Labels, forSite } from '../../labels';
import { LOOPBACK, type ContainerSpec, type MountSpec } from './types';

/** Where the site source is mounted inside the container */
export const SITE_ROOT = '/app';

/** Port the proxy forwards site traffic to */
export const SITE_UPSTREAM_PORT = 8080;

export const DEBUG_ON = 'DEBUG_MODE=develop,debug';
export const DEBUG_OFF = 'DEBUG_MODE=off';

/** Variable names of `KEY=VALUE` entries, sorted */
export function envKeys(env: string[]): string[] {
  return env.map((entry) => entry.split('=')[0]).sort();
}

export interface SiteGeneratorOptions {
  environment: string;
  home: string;
  config: EnvironmentConfig;
}

/**
 * Generate the container for a site. The same spec is used to create the
 * container and to decide whether a running one has drifted.
 */
export function generateSite(site: SiteConfig, options: SiteGeneratorOptions): ContainerSpec {
  const { environment, home, config } = options;

  const mounts: MountSpec[] = [{ type: 'bind', source: siteRootPath(site, home), target: SITE_ROOT }];
  for (const [source, target] of siteMountPaths(site, home)) {
    mounts.push({ type: 'bind', source, target });
  }

  const env = [...asEnvs(config), site.debug ? DEBUG_ON : DEBUG_OFF];

  return {
    name: site.hostname,
    image: siteImageFor(config, site),
    labels: forSite(environment, site.hostname)
      .with(Labels.managed, 'true')
      .with(Labels.envKeys, envKeys(env).join(','))
      .toLabels(),
    env,
    ports: [],
    mounts,
    extraHosts: siteHostnames(site).map((hostname) => `${hostname}:${LOOPBACK}`),
    networkAliases: [],
  };
}
