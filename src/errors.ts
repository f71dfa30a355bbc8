/**
 * Error hierarchy for bootmark.
 *
 * Every error raised by the alias engine or the bootstrap sequence is a
 * static-configuration fault, so none of them is retryable.
 */

export interface ErrorOptions {
  cause?: Error;
  bootstrapId?: string;
  suggestion?: string | null;
}

export class BootstrapError extends Error {
  static readonly DEFAULT_RETRYABLE: boolean = false;

  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly bootstrapId?: string;
  readonly timestamp: string;
  readonly retryable: boolean;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    bootstrapId?: string,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'BootstrapError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.bootstrapId = bootstrapId;
    this.timestamp = new Date().toISOString();
    this.retryable = (this.constructor as typeof BootstrapError).DEFAULT_RETRYABLE;
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    if (this.bootstrapId !== undefined) {
      obj.bootstrap_id = this.bootstrapId;
    }
    obj.timestamp = this.timestamp;
    obj.retryable = this.retryable;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends BootstrapError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      'CONFIG_NOT_FOUND',
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.bootstrapId,
      options?.suggestion,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends BootstrapError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, details, options?.cause, options?.bootstrapId, options?.suggestion);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends BootstrapError {
  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super('GENERAL_INVALID_INPUT', message, {}, options?.cause, options?.bootstrapId, options?.suggestion);
    this.name = 'InvalidInputError';
  }
}

/**
 * A unit definition that cannot be described: a missing or type-incompatible
 * alias target, a bad default, or aliased attributes with different defaults.
 */
export class MalformedUnitError extends BootstrapError {
  constructor(unit: string, reason: string, options?: ErrorOptions) {
    super(
      'MALFORMED_UNIT',
      `Malformed unit '${unit}': ${reason}`,
      { unit, reason },
      options?.cause,
      options?.bootstrapId,
      options?.suggestion,
    );
    this.name = 'MalformedUnitError';
  }

  get unit(): string {
    return String(this.details['unit']);
  }
}

export class AliasCycleError extends BootstrapError {
  readonly cyclePath: readonly string[];

  constructor(cyclePath: string[], options?: ErrorOptions) {
    super(
      'ALIAS_CYCLE',
      `Alias cycle detected: ${cyclePath.join(' -> ')}`,
      { cyclePath },
      options?.cause,
      options?.bootstrapId,
      options?.suggestion,
    );
    this.name = 'AliasCycleError';
    this.cyclePath = Object.freeze([...cyclePath]);
  }
}

export interface ConflictingAssignment {
  readonly key: string;
  readonly value: unknown;
}

export class AliasConflictError extends BootstrapError {
  readonly conflicts: readonly ConflictingAssignment[];

  constructor(conflicts: ConflictingAssignment[], options?: ErrorOptions) {
    const rendered = conflicts.map((c) => `${c.key}=${JSON.stringify(c.value)}`).join(', ');
    super(
      'ALIAS_CONFLICT',
      `Aliased attributes declared with different values: ${rendered}`,
      { keys: conflicts.map((c) => c.key) },
      options?.cause,
      options?.bootstrapId,
      options?.suggestion ?? 'Declare only one of the aliased attributes, or give them the same value.',
    );
    this.name = 'AliasConflictError';
    this.conflicts = Object.freeze([...conflicts]);
  }
}

export class DiscoveryError extends BootstrapError {
  constructor(reason: string, options?: ErrorOptions) {
    super(
      'DISCOVERY_FAILED',
      `Automatic discovery failed: ${reason}`,
      { reason },
      options?.cause,
      options?.bootstrapId,
      options?.suggestion,
    );
    this.name = 'DiscoveryError';
  }
}

export class BootstrapCancelledError extends BootstrapError {
  constructor(message: string = 'Bootstrap was cancelled', options?: ErrorOptions) {
    super('BOOTSTRAP_CANCELLED', message, {}, options?.cause, options?.bootstrapId, options?.suggestion);
    this.name = 'BootstrapCancelledError';
  }
}

/**
 * All error codes as constants.
 */
export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  GENERAL_INVALID_INPUT: 'GENERAL_INVALID_INPUT',
  MALFORMED_UNIT: 'MALFORMED_UNIT',
  ALIAS_CYCLE: 'ALIAS_CYCLE',
  ALIAS_CONFLICT: 'ALIAS_CONFLICT',
  DISCOVERY_FAILED: 'DISCOVERY_FAILED',
  BOOTSTRAP_CANCELLED: 'BOOTSTRAP_CANCELLED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
