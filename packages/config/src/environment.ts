/**
 * Values derived from an environment config: container hostnames,
 * resolved paths and the environment variables handed to site containers.
 */

import { isAbsolute, join, resolve } from 'path';
import type { DatabaseConfig, EnvironmentConfig, RuntimeSettings, SiteConfig } from './schema';

export const DEFAULT_SITE_IMAGE = 'docker.io/berthdev/web:{version}-dev';

const RUNTIME_DEFAULTS: Required<RuntimeSettings> = {
  displayErrors: true,
  maxExecutionTime: 5000,
  maxInputVars: 5000,
  maxInputTime: -1,
  memoryLimit: '512M',
  uploadMaxFileSize: '512M',
  postMaxSize: '512M',
  opcacheEnable: false,
  opcacheRevalidateFreq: 0,
};

/**
 * Get the container hostname for a database, e.g. mysql-8.0-3306
 */
export function databaseHostname(db: DatabaseConfig): string {
  if (!db.engine || !db.version || !db.port) {
    throw new Error('database engine, version and port are required to build a hostname');
  }
  return `${db.engine}-${db.version}-${db.port}`;
}

/**
 * Resolve the image reference for a site runtime
 */
export function siteImage(template: string, version: string): string {
  return template.split('{version}').join(version);
}

export function siteImageFor(config: EnvironmentConfig, site: SiteConfig): string {
  return siteImage(config.siteImage || DEFAULT_SITE_IMAGE, site.runtime);
}

function expandPath(path: string, home: string): string {
  const expanded = path === '~' || path.startsWith('~/') ? join(home, path.slice(1)) : path;
  return isAbsolute(expanded) ? resolve(expanded) : resolve(home, expanded);
}

/**
 * Absolute path of the site source, with ~ expanded. Relative paths are
 * taken from the home directory.
 */
export function siteRootPath(site: SiteConfig, home: string): string {
  return expandPath(site.path, home);
}

/**
 * Extra bind mounts for a site keyed by absolute source path
 */
export function siteMountPaths(site: SiteConfig, home: string): Map<string, string> {
  const mounts = new Map<string, string>();
  for (const mount of site.mounts || []) {
    mounts.set(expandPath(mount.source, home), mount.target);
  }
  return mounts;
}

export function siteHostnames(site: SiteConfig): string[] {
  return [site.hostname, ...(site.aliases || [])];
}

/**
 * Every hostname and alias across all sites, in declaration order
 */
export function allHostnames(config: EnvironmentConfig): string[] {
  return config.sites.flatMap(siteHostnames);
}

function onOff(value: boolean): string {
  return value ? 'on' : 'off';
}

/**
 * Materialize the environment-wide variables every site container gets.
 * Runtime settings come first in a fixed order, then custom env sorted by key.
 */
export function asEnvs(config: EnvironmentConfig): string[] {
  const settings: Required<RuntimeSettings> = { ...RUNTIME_DEFAULTS, ...config.runtime };

  const envs = [
    `RUNTIME_DISPLAY_ERRORS=${onOff(settings.displayErrors)}`,
    `RUNTIME_MAX_EXECUTION_TIME=${settings.maxExecutionTime}`,
    `RUNTIME_MAX_INPUT_VARS=${settings.maxInputVars}`,
    `RUNTIME_MAX_INPUT_TIME=${settings.maxInputTime}`,
    `RUNTIME_MEMORY_LIMIT=${settings.memoryLimit}`,
    `RUNTIME_UPLOAD_MAX_FILESIZE=${settings.uploadMaxFileSize}`,
    `RUNTIME_POST_MAX_SIZE=${settings.postMaxSize}`,
    `RUNTIME_OPCACHE_ENABLE=${settings.opcacheEnable ? 1 : 0}`,
    `RUNTIME_OPCACHE_REVALIDATE_FREQ=${settings.opcacheRevalidateFreq}`,
  ];

  const custom = Object.entries(config.env || {}).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, value] of custom) {
    envs.push(`${key}=${value}`);
  }

  return envs;
}
