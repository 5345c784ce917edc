import type { ValidationError } from './schema';

export class MissingEnvironmentError extends Error {
  constructor() {
    super('missing the environment name');
    this.name = 'MissingEnvironmentError';
  }
}

export class ConfigNotFoundError extends Error {
  file: string;

  constructor(environment: string, file: string) {
    super(`there is no config file for the environment "${environment}" (expected ${file})`);
    this.name = 'ConfigNotFoundError';
    this.file = file;
  }
}

export class ConfigValidationError extends Error {
  errors: ValidationError[];

  constructor(source: string, errors: ValidationError[]) {
    const lines = errors.map((e) => `  ${e.path}: ${e.message}`);
    super(`Invalid config in ${source}:\n${lines.join('\n')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class SiteConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SiteConflictError';
  }
}

export class UnknownSiteError extends Error {
  hostname: string;

  constructor(hostname: string) {
    super(`unknown site ${hostname}`);
    this.name = 'UnknownSiteError';
    this.hostname = hostname;
  }
}
