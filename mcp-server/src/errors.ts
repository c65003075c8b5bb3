/**
 * Error hierarchy for column matching.
 *
 * Fatal errors (validation, provider lookup and initialization) abort a run.
 * Transport and parse errors are absorbed per header by the orchestrator.
 */

export type ErrorCode =
  | 'VALIDATION'
  | 'UNKNOWN_PROVIDER'
  | 'PROVIDER_INITIALIZATION'
  | 'CONFIG_INVALID'
  | 'TRANSPORT'
  | 'NO_JSON_FOUND'
  | 'UNPARSEABLE_RESPONSE';

export interface ErrorContext {
  providerId?: string;
  operation?: string;
  cause?: unknown;
}

export class ColumnMatchingError extends Error {
  readonly code: ErrorCode;
  readonly providerId?: string;
  readonly operation?: string;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'ColumnMatchingError';
    this.code = code;
    this.providerId = context.providerId;
    this.operation = context.operation;
  }

  /**
   * Render as `[provider] operation: message`, omitting missing parts.
   */
  formattedMessage(): string {
    const prefix = [
      this.providerId ? `[${this.providerId}]` : '',
      this.operation ? `${this.operation}:` : '',
    ]
      .filter(Boolean)
      .join(' ');
    return prefix ? `${prefix} ${this.message}` : this.message;
  }
}

export class ValidationError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('VALIDATION', message, context);
    this.name = 'ValidationError';
  }
}

export class UnknownProviderError extends ColumnMatchingError {
  constructor(providerId: string) {
    super('UNKNOWN_PROVIDER', `Unknown provider: ${providerId}`, { providerId });
    this.name = 'UnknownProviderError';
  }
}

export class ProviderInitializationError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('PROVIDER_INITIALIZATION', message, context);
    this.name = 'ProviderInitializationError';
  }
}

export class ConfigInvalidError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('CONFIG_INVALID', message, context);
    this.name = 'ConfigInvalidError';
  }
}

/**
 * A required credential parameter is absent.
 */
export class MissingCredentialsError extends ConfigInvalidError {
  readonly parameter: string;

  constructor(parameter: string, context?: ErrorContext) {
    super(`Missing required parameter "${parameter}" (credentials not configured)`, context);
    this.name = 'MissingCredentialsError';
    this.parameter = parameter;
  }
}

export class TransportError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('TRANSPORT', message, context);
    this.name = 'TransportError';
  }
}

export class NoJsonFoundError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('NO_JSON_FOUND', message, context);
    this.name = 'NoJsonFoundError';
  }
}

export class UnparseableResponseError extends ColumnMatchingError {
  constructor(message: string, context?: ErrorContext) {
    super('UNPARSEABLE_RESPONSE', message, context);
    this.name = 'UnparseableResponseError';
  }
}

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set([
  'VALIDATION',
  'UNKNOWN_PROVIDER',
  'PROVIDER_INITIALIZATION',
  'CONFIG_INVALID',
]);

export function isFatalError(error: unknown): boolean {
  return error instanceof ColumnMatchingError && FATAL_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasMissingCredentials(error: unknown): boolean {
  for (let current: unknown = error; current instanceof Error; current = current.cause) {
    if (current instanceof MissingCredentialsError) return true;
  }
  return false;
}

/**
 * Translate a failure into text suitable for an end user. A missing
 * credential anywhere in the cause chain gets a configuration hint.
 */
export function toUserMessage(error: unknown): string {
  if (hasMissingCredentials(error)) {
    return 'Provider credentials are not configured. Set the API key or access key parameters for the selected provider.';
  }
  return error instanceof ColumnMatchingError ? error.formattedMessage() : errorMessage(error);
}
