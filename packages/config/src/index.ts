/**
 * @berth/config
 * Environment schema, YAML loader and derived values for berth
 */

// Schema types
export type {
  EnvironmentConfig,
  LoadedConfig,
  DatabaseConfig,
  DatabaseEngine,
  ServicesConfig,
  ServiceName,
  SiteConfig,
  MountConfig,
  RuntimeSettings,
  ValidationResult,
  ValidationError,
} from './schema';
export { DATABASE_ENGINES, SERVICE_NAMES } from './schema';

// Parser
export {
  CONFIG_DIR,
  configPath,
  defaultConfig,
  parseConfig,
  validateConfig,
  loadConfig,
  saveConfig,
} from './parser';

// Site edits
export { addSite, setSiteDebug } from './sites';

// Derived values
export {
  DEFAULT_SITE_IMAGE,
  asEnvs,
  databaseHostname,
  siteImage,
  siteImageFor,
  siteRootPath,
  siteMountPaths,
  siteHostnames,
  allHostnames,
} from './environment';

// Errors
export {
  MissingEnvironmentError,
  ConfigNotFoundError,
  ConfigValidationError,
  SiteConflictError,
  UnknownSiteError,
} from './errors';
