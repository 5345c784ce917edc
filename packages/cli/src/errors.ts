/**
 * Error taxonomy for a convergence pass. Every error names the entity it
 * concerns and keeps the underlying failure as `cause`.
 */

export type ErrorKind =
  | 'precondition'
  | 'runtime-communication'
  | 'drift-resolution'
  | 'routing-sync'
  | 'hosts-sync'
  | 'cancelled';

export interface BerthErrorOptions {
  entity?: string;
  cause?: unknown;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined || cause === null) return '';
  return String(cause);
}

export class BerthError extends Error {
  kind: ErrorKind;
  entity?: string;

  constructor(kind: ErrorKind, message: string, options: BerthErrorOptions = {}) {
    const detail = describeCause(options.cause);
    super(detail ? `${message}: ${detail}` : message, { cause: options.cause });
    this.name = 'BerthError';
    this.kind = kind;
    this.entity = options.entity;
  }
}

export class PreconditionError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('precondition', message, options);
    this.name = 'PreconditionError';
  }
}

export class RuntimeCommunicationError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('runtime-communication', message, options);
    this.name = 'RuntimeCommunicationError';
  }
}

export class DriftResolutionError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('drift-resolution', message, options);
    this.name = 'DriftResolutionError';
  }
}

export class RoutingSyncError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('routing-sync', message, options);
    this.name = 'RoutingSyncError';
  }
}

/**
 * Raised after every container and the proxy are already up, so the
 * environment is usable even though its hostnames may not resolve.
 */
export class HostsSyncError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('hosts-sync', message, options);
    this.name = 'HostsSyncError';
  }
}

/**
 * The pass was interrupted between two runtime calls. Nothing is rolled
 * back; the next pass picks up from the current state.
 */
export class CancelledError extends BerthError {
  constructor(message: string, options?: BerthErrorOptions) {
    super('cancelled', message, options);
    this.name = 'CancelledError';
  }
}
