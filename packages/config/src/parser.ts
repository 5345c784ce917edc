/**
 * Berth Config Parser
 * Reads, validates and writes ~/.berth/<environment>.yaml
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, normalize } from 'path';
import YAML from 'yaml';
import { siteHostnames, siteRootPath } from './environment';
import { ConfigNotFoundError, ConfigValidationError, MissingEnvironmentError } from './errors';
import {
  DATABASE_ENGINES,
  SERVICE_NAMES,
  type DatabaseConfig,
  type DatabaseEngine,
  type EnvironmentConfig,
  type LoadedConfig,
  type MountConfig,
  type RuntimeSettings,
  type ServicesConfig,
  type SiteConfig,
  type ValidationError,
  type ValidationResult,
} from './schema';

export const CONFIG_DIR = '.berth';

/**
 * Get the config file path for an environment
 */
export function configPath(home: string, environment: string): string {
  return join(home, CONFIG_DIR, `${environment}.yaml`);
}

/**
 * Config written on first run: one database per supported wire protocol,
 * no services and no sites.
 */
export function defaultConfig(): EnvironmentConfig {
  return {
    databases: [
      { engine: 'mysql', version: '8.0', port: '3306' },
      { engine: 'postgres', version: '12', port: '5432' },
    ],
    services: { mailhog: false, redis: false, minio: false, dynamodb: false },
    sites: [],
  };
}

// =============================================================================
// Parsing
// =============================================================================

type Doc = Record<string, unknown>;

function isRecord(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDatabaseEngine(value: string): value is DatabaseEngine {
  return DATABASE_ENGINES.some((engine) => engine === value);
}

/**
 * Reads typed fields out of an untyped YAML document, collecting
 * structural errors instead of throwing on the first one.
 */
class DocReader {
  constructor(private readonly errors: ValidationError[]) {}

  fail(path: string, message: string, value?: unknown): void {
    this.errors.push({ path, message, value });
  }

  list(value: unknown, path: string): unknown[] {
    if (value === undefined || value === null || value === '') return [];
    if (!Array.isArray(value)) {
      this.errors.push({ path, message: 'must be a list', value });
      return [];
    }
    return value;
  }

  record(value: unknown, path: string): Doc | null {
    if (value === undefined || value === null || value === '') return null;
    if (!isRecord(value)) {
      this.errors.push({ path, message: 'must be a mapping', value });
      return null;
    }
    return value;
  }

  string(value: unknown, path: string): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    this.errors.push({ path, message: 'must be a string', value });
    return '';
  }

  boolean(value: unknown, path: string): boolean | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    if (value === true || value === 'true') return true;
    if (value === false || value === 'false') return false;
    this.errors.push({ path, message: 'must be true or false', value });
    return undefined;
  }

  number(value: unknown, path: string): number | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (typeof value === 'boolean' || Number.isNaN(parsed)) {
      this.errors.push({ path, message: 'must be a number', value });
      return undefined;
    }
    return parsed;
  }
}

function readDatabase(reader: DocReader, value: unknown, path: string): DatabaseConfig | null {
  const doc = reader.record(value, path);
  if (!doc) return null;

  const engine = reader.string(doc.engine, `${path}.engine`);
  if (!isDatabaseEngine(engine)) {
    reader.fail(`${path}.engine`, `engine must be one of: ${DATABASE_ENGINES.join(', ')}`, engine);
    return null;
  }

  return {
    engine,
    version: reader.string(doc.version, `${path}.version`),
    port: reader.string(doc.port, `${path}.port`),
  };
}

function readSite(reader: DocReader, value: unknown, path: string): SiteConfig | null {
  const doc = reader.record(value, path);
  if (!doc) return null;

  const site: SiteConfig = {
    hostname: reader.string(doc.hostname, `${path}.hostname`),
    runtime: reader.string(doc.runtime, `${path}.runtime`),
    path: reader.string(doc.path, `${path}.path`),
  };

  const aliases = reader
    .list(doc.aliases, `${path}.aliases`)
    .map((alias, i) => reader.string(alias, `${path}.aliases[${i}]`));
  if (aliases.length > 0) site.aliases = aliases;

  const mounts: MountConfig[] = [];
  reader.list(doc.mounts, `${path}.mounts`).forEach((mount, i) => {
    const mountDoc = reader.record(mount, `${path}.mounts[${i}]`);
    if (mountDoc) {
      mounts.push({
        source: reader.string(mountDoc.source, `${path}.mounts[${i}].source`),
        target: reader.string(mountDoc.target, `${path}.mounts[${i}].target`),
      });
    }
  });
  if (mounts.length > 0) site.mounts = mounts;

  const debug = reader.boolean(doc.debug, `${path}.debug`);
  if (debug !== undefined) site.debug = debug;

  return site;
}

function readServices(reader: DocReader, value: unknown): ServicesConfig {
  const doc = reader.record(value, 'services') || {};
  const services: ServicesConfig = { mailhog: false, redis: false, minio: false, dynamodb: false };
  for (const name of SERVICE_NAMES) {
    services[name] = reader.boolean(doc[name], `services.${name}`) ?? false;
  }
  return services;
}

function readRuntime(reader: DocReader, value: unknown): RuntimeSettings | undefined {
  const doc = reader.record(value, 'runtime');
  if (!doc) return undefined;

  const settings: RuntimeSettings = {};
  const displayErrors = reader.boolean(doc.displayErrors, 'runtime.displayErrors');
  if (displayErrors !== undefined) settings.displayErrors = displayErrors;
  const opcacheEnable = reader.boolean(doc.opcacheEnable, 'runtime.opcacheEnable');
  if (opcacheEnable !== undefined) settings.opcacheEnable = opcacheEnable;

  const numbers = ['maxExecutionTime', 'maxInputVars', 'maxInputTime', 'opcacheRevalidateFreq'] as const;
  for (const key of numbers) {
    const parsed = reader.number(doc[key], `runtime.${key}`);
    if (parsed !== undefined) settings[key] = parsed;
  }

  const sizes = ['memoryLimit', 'uploadMaxFileSize', 'postMaxSize'] as const;
  for (const key of sizes) {
    const parsed = reader.string(doc[key], `runtime.${key}`);
    if (parsed) settings[key] = parsed;
  }

  return settings;
}

function readEnv(reader: DocReader, value: unknown): Record<string, string> | undefined {
  const doc = reader.record(value, 'env');
  if (!doc) return undefined;

  const env: Record<string, string> = {};
  for (const [key, raw] of Object.entries(doc)) {
    env[key] = reader.string(raw, `env.${key}`);
  }
  return env;
}

/**
 * Parse YAML config content. Every scalar is read as a string first so
 * versions such as 8.0 keep their text.
 */
export function parseConfig(content: string, source = 'config'): EnvironmentConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content, { schema: 'failsafe' });
  } catch (err) {
    throw new Error(`Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const errors: ValidationError[] = [];
  const reader = new DocReader(errors);
  const doc = reader.record(parsed, '(root)') || {};

  const config: EnvironmentConfig = {
    databases: [],
    services: readServices(reader, doc.services),
    sites: [],
  };

  reader.list(doc.databases, 'databases').forEach((value, i) => {
    const db = readDatabase(reader, value, `databases[${i}]`);
    if (db) config.databases.push(db);
  });

  reader.list(doc.sites, 'sites').forEach((value, i) => {
    const site = readSite(reader, value, `sites[${i}]`);
    if (site) config.sites.push(site);
  });

  const runtime = readRuntime(reader, doc.runtime);
  if (runtime) config.runtime = runtime;

  const env = readEnv(reader, doc.env);
  if (env) config.env = env;

  const image = reader.string(doc.siteImage, 'siteImage');
  if (image) config.siteImage = image;

  if (errors.length > 0) {
    throw new ConfigValidationError(source, errors);
  }

  return config;
}

// =============================================================================
// Validation
// =============================================================================

const HOSTNAME_PATTERN = /^(?=.{1,253}$)[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/i;

function isValidHostname(hostname: string): boolean {
  return HOSTNAME_PATTERN.test(hostname);
}

function isValidPort(port: string): boolean {
  if (!/^\d+$/.test(port)) return false;
  const value = Number(port);
  return value > 0 && value < 65536;
}

/**
 * Validate the entire config. With `home`, site paths are compared after
 * ~ and relative paths are resolved against it.
 */
export function validateConfig(config: EnvironmentConfig, home?: string): ValidationResult {
  const errors: ValidationError[] = [];

  config.databases.forEach((db, i) => validateDatabase(db, `databases[${i}]`, errors));
  config.sites.forEach((site, i) => validateSite(site, `sites[${i}]`, errors));

  if (config.siteImage !== undefined && !config.siteImage.includes('{version}')) {
    errors.push({
      path: 'siteImage',
      message: 'siteImage must contain a {version} placeholder',
      value: config.siteImage,
    });
  }

  checkDuplicates(config, errors, home);

  return {
    valid: errors.length === 0,
    errors,
  };
}

function validateDatabase(db: DatabaseConfig, path: string, errors: ValidationError[]): void {
  if (!isDatabaseEngine(db.engine)) {
    errors.push({
      path: `${path}.engine`,
      message: `engine must be one of: ${DATABASE_ENGINES.join(', ')}`,
      value: db.engine,
    });
  }

  if (!db.version) {
    errors.push({ path: `${path}.version`, message: 'version is required' });
  }

  if (!db.port) {
    errors.push({ path: `${path}.port`, message: 'port is required' });
  } else if (!isValidPort(db.port)) {
    errors.push({ path: `${path}.port`, message: 'port must be a number between 1 and 65535', value: db.port });
  }
}

function validateSite(site: SiteConfig, path: string, errors: ValidationError[]): void {
  if (!site.hostname) {
    errors.push({ path: `${path}.hostname`, message: 'hostname is required' });
  } else if (!isValidHostname(site.hostname)) {
    errors.push({ path: `${path}.hostname`, message: 'hostname is not a valid hostname', value: site.hostname });
  }

  (site.aliases || []).forEach((alias, i) => {
    if (!isValidHostname(alias)) {
      errors.push({ path: `${path}.aliases[${i}]`, message: 'alias is not a valid hostname', value: alias });
    }
  });

  if (!site.runtime) {
    errors.push({ path: `${path}.runtime`, message: 'runtime is required' });
  }

  if (!site.path) {
    errors.push({ path: `${path}.path`, message: 'path is required' });
  }

  (site.mounts || []).forEach((mount, i) => {
    if (!mount.source) {
      errors.push({ path: `${path}.mounts[${i}].source`, message: 'source is required' });
    }
    if (!mount.target || !mount.target.startsWith('/')) {
      errors.push({
        path: `${path}.mounts[${i}].target`,
        message: 'target must be an absolute container path',
        value: mount.target,
      });
    }
  });
}

function sitePathKey(site: SiteConfig, home?: string): string {
  if (home !== undefined) return siteRootPath(site, home);
  const path = normalize(site.path);
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

function checkDuplicates(config: EnvironmentConfig, errors: ValidationError[], home?: string): void {
  const hosts = new Map<string, string>(); // hostname -> path
  const roots = new Map<string, string>();
  config.sites.forEach((site, i) => {
    siteHostnames(site).forEach((hostname, j) => {
      const path = j === 0 ? `sites[${i}].hostname` : `sites[${i}].aliases[${j - 1}]`;
      const seen = hosts.get(hostname);
      if (seen) {
        errors.push({ path, message: `duplicate hostname "${hostname}" (also defined at ${seen})`, value: hostname });
      } else {
        hosts.set(hostname, path);
      }
    });

    if (!site.path) return;
    // Each source directory belongs to one site
    const root = sitePathKey(site, home);
    const seenRoot = roots.get(root);
    if (seenRoot) {
      errors.push({ path: `sites[${i}].path`, message: `duplicate path "${root}" (also used by ${seenRoot})`, value: site.path });
    } else {
      roots.set(root, `sites[${i}]`);
    }
  });

  const databases = new Map<string, string>();
  const ports = new Map<string, string>();
  config.databases.forEach((db, i) => {
    const path = `databases[${i}]`;
    if (!db.engine || !db.version || !db.port) return;

    // Containers are found by engine and version, so each pair may appear once
    const identity = `${db.engine} ${db.version}`;
    const seenDb = databases.get(identity);
    if (seenDb) {
      errors.push({ path, message: `duplicate database ${identity} (also defined at ${seenDb})`, value: identity });
    } else {
      databases.set(identity, path);
    }

    const seenPort = ports.get(db.port);
    if (seenPort) {
      errors.push({ path: `${path}.port`, message: `port ${db.port} is already used by ${seenPort}`, value: db.port });
    } else {
      ports.set(db.port, path);
    }
  });
}

// =============================================================================
// Loading and saving
// =============================================================================

/**
 * Load the config for an environment from <home>/.berth/<environment>.yaml
 */
export function loadConfig(home: string, environment: string): LoadedConfig {
  if (!environment) {
    throw new MissingEnvironmentError();
  }

  const file = configPath(home, environment);
  if (!existsSync(file)) {
    throw new ConfigNotFoundError(environment, file);
  }

  const config = parseConfig(readFileSync(file, 'utf-8'), file);

  const result = validateConfig(config, home);
  if (!result.valid) {
    throw new ConfigValidationError(file, result.errors);
  }

  return { environment, file, config };
}

/**
 * Write a config back to its file, creating the directory when needed
 */
export function saveConfig(loaded: LoadedConfig): void {
  mkdirSync(dirname(loaded.file), { recursive: true });
  writeFileSync(loaded.file, YAML.stringify(loaded.config));
}
