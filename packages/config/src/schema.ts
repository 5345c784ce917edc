/**
 * Berth Environment Schema
 * TypeScript interfaces for ~/.berth/<environment>.yaml
 */

// =============================================================================
// Databases
// =============================================================================

export type DatabaseEngine = 'mysql' | 'mariadb' | 'postgres';

export const DATABASE_ENGINES: readonly DatabaseEngine[] = ['mysql', 'mariadb', 'postgres'];

export interface DatabaseConfig {
  engine: DatabaseEngine;
  version: string;
  port: string;
}

// =============================================================================
// Services
// =============================================================================

/**
 * Auxiliary services toggled on or off per environment.
 * Volumes, ports and networking for these are fixed by berth.
 */
export interface ServicesConfig {
  mailhog: boolean;
  redis: boolean;
  minio: boolean;
  dynamodb: boolean;
}

export type ServiceName = keyof ServicesConfig;

export const SERVICE_NAMES: readonly ServiceName[] = ['mailhog', 'redis', 'minio', 'dynamodb'];

// =============================================================================
// Sites
// =============================================================================

export interface MountConfig {
  source: string;
  target: string;
}

export interface SiteConfig {
  hostname: string;
  aliases?: string[];
  runtime: string;       // Language runtime tag, substituted into the site image
  path: string;          // Local source directory, mounted at /app
  mounts?: MountConfig[];
  debug?: boolean;
}

// =============================================================================
// Runtime settings
// =============================================================================

/**
 * Environment-wide runtime tuning, injected into every site container
 * as environment variables.
 */
export interface RuntimeSettings {
  displayErrors?: boolean;
  maxExecutionTime?: number;
  maxInputVars?: number;
  maxInputTime?: number;
  memoryLimit?: string;
  uploadMaxFileSize?: string;
  postMaxSize?: string;
  opcacheEnable?: boolean;
  opcacheRevalidateFreq?: number;
}

// =============================================================================
// Root Config
// =============================================================================

export interface EnvironmentConfig {
  databases: DatabaseConfig[];
  services: ServicesConfig;
  sites: SiteConfig[];
  runtime?: RuntimeSettings;
  env?: Record<string, string>;
  siteImage?: string;     // Image template, `{version}` is replaced by the site runtime
}

/**
 * A config together with where it was read from.
 */
export interface LoadedConfig {
  environment: string;
  file: string;
  config: EnvironmentConfig;
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
