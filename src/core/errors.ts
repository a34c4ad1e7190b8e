/**
 * Error hierarchy for the mapper.
 *
 * Every error carries a machine-readable `code` and frozen `details`, so callers
 * can branch on the failure kind without parsing messages:
 *
 * ```ts
 * try {
 *   await executor.query(statement, { id: 1 });
 * } catch (error) {
 *   if (isQuarryError(error) && error.code === 'EXECUTOR_CLOSED') {
 *     // open a new session
 *   }
 * }
 * ```
 */

export type QuarryErrorCode =
  | 'EXECUTOR_ERROR'
  | 'EXECUTOR_CLOSED'
  | 'REFLECTION_ERROR'
  | 'METADATA_CONFLICT'
  | 'CONSTRUCTION_UNSUPPORTED'
  | 'PROPERTY_NOT_FOUND'
  | 'STORE_ACCESS'
  | 'CONFIGURATION_ERROR';

export interface QuarryErrorOptions {
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Underlying cause of the error */
  cause?: unknown;
}

/**
 * Base class of every error raised by the mapper.
 */
export class QuarryError extends Error {
  readonly code: QuarryErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, code: QuarryErrorCode, options: QuarryErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'QuarryError';
    this.code = code;
    this.details = Object.freeze({ ...(options.details ?? {}) });
  }
}

/**
 * Failure inside the execution layer (cache misuse, unresolvable deferred load,
 * session that could not be opened).
 */
export class ExecutorError extends QuarryError {
  constructor(message: string, options?: QuarryErrorOptions) {
    super(message, 'EXECUTOR_ERROR', options);
    this.name = 'ExecutorError';
  }
}

/**
 * Raised by any executor operation attempted after `close()`.
 */
export class ExecutorClosedError extends QuarryError {
  constructor(message = 'Executor was closed.') {
    super(message, 'EXECUTOR_CLOSED');
    this.name = 'ExecutorClosedError';
  }
}

export class ReflectionError extends QuarryError {
  constructor(message: string, options?: QuarryErrorOptions, code: QuarryErrorCode = 'REFLECTION_ERROR') {
    super(message, code, options);
    this.name = 'ReflectionError';
  }
}

/**
 * Two accessors of one property could not be ordered by their declared types.
 */
export class MetadataConflictError extends ReflectionError {
  constructor(message: string, options?: QuarryErrorOptions) {
    super(message, options, 'METADATA_CONFLICT');
    this.name = 'MetadataConflictError';
  }
}

export class ConstructionUnsupportedError extends ReflectionError {
  constructor(typeName: string) {
    super(`There is no default constructor for ${typeName}`, { details: { type: typeName } }, 'CONSTRUCTION_UNSUPPORTED');
    this.name = 'ConstructionUnsupportedError';
  }
}

export class PropertyNotFoundError extends ReflectionError {
  constructor(kind: 'getter' | 'setter', property: string, typeName: string) {
    super(
      `There is no ${kind} for property named '${property}' in '${typeName}'`,
      { details: { kind, property, type: typeName } },
      'PROPERTY_NOT_FOUND'
    );
    this.name = 'PropertyNotFoundError';
  }
}

/**
 * Failure reported by the store (driver error, constraint violation, I/O).
 */
export class StoreAccessError extends QuarryError {
  constructor(message: string, options?: QuarryErrorOptions) {
    super(message, 'STORE_ACCESS', options);
    this.name = 'StoreAccessError';
  }
}

export class ConfigurationError extends QuarryError {
  constructor(message: string, options?: QuarryErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

export const isQuarryError = (error: unknown): error is QuarryError => error instanceof QuarryError;

/**
 * Renders an unknown thrown value for log lines.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
};
