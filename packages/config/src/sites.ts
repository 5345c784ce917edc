/**
 * Edits to the site list of an environment config. Both functions return a
 * new config and leave the one passed in untouched.
 */

import { allHostnames, siteHostnames, siteRootPath } from './environment';
import { ConfigValidationError, SiteConflictError, UnknownSiteError } from './errors';
import { validateConfig } from './parser';
import type { EnvironmentConfig, SiteConfig } from './schema';

/**
 * Append a site. Its hostname, aliases and resolved path must not be used
 * by another site.
 */
export function addSite(config: EnvironmentConfig, site: SiteConfig, home: string): EnvironmentConfig {
  const taken = new Set(allHostnames(config));
  const clash = siteHostnames(site).find((hostname) => taken.has(hostname));
  if (clash) {
    throw new SiteConflictError(`hostname ${clash} already exists`);
  }

  const root = siteRootPath(site, home);
  const owner = config.sites.find((other) => siteRootPath(other, home) === root);
  if (owner) {
    throw new SiteConflictError(`site path ${root} already exists (used by ${owner.hostname})`);
  }

  const next: EnvironmentConfig = { ...config, sites: [...config.sites, site] };
  const result = validateConfig(next, home);
  if (!result.valid) {
    throw new ConfigValidationError(`site ${site.hostname || '(no hostname)'}`, result.errors);
  }
  return next;
}

export function setSiteDebug(config: EnvironmentConfig, hostname: string, debug: boolean): EnvironmentConfig {
  if (!config.sites.some((site) => site.hostname === hostname)) {
    throw new UnknownSiteError(hostname);
  }
  return {
    ...config,
    sites: config.sites.map((site) => (site.hostname === hostname ? { ...site, debug } : site)),
  };
}
