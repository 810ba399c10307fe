// Error taxonomy for the edge engine, cache layer and parlay engine.
// Every domain error carries a stable code and the HTTP status the route layer should use.

export type EngineErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_LEGS'
  | 'INVALID_PROBABILITY'
  | 'UPSTREAM_UNAVAILABLE'
  | 'CACHE_MISS'
  | 'STAT_SOURCE'
  | 'CONFIG';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly status: number;

  constructor(code: EngineErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * Fewer observations than the configured minimum.
 * Callers surface this as "no edge available", not as a failure.
 */
export class InsufficientDataError extends EngineError {
  readonly required: number;
  readonly received: number;

  constructor(required: number, received: number) {
    super('INSUFFICIENT_DATA', `Need at least ${required} observations, got ${received}`, 422);
    this.required = required;
    this.received = received;
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string) {
    super('INVALID_INPUT', message, 400);
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class InsufficientLegsError extends EngineError {
  readonly received: number;

  constructor(received: number) {
    super('INSUFFICIENT_LEGS', `Parlay requires at least 2 legs, got ${received}`, 400);
    this.received = received;
  }
}

export class InvalidProbabilityError extends EngineError {
  readonly label: string;
  readonly probability: number;

  constructor(label: string, probability: number) {
    super('INVALID_PROBABILITY', `Leg "${label}" has probability ${probability}, expected (0, 100]`, 400);
    this.label = label;
    this.probability = probability;
  }
}

export class UpstreamUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown; code?: 'UPSTREAM_UNAVAILABLE' | 'CACHE_MISS' }) {
    super(options?.code ?? 'UPSTREAM_UNAVAILABLE', message, 503, { cause: options?.cause });
  }
}

/**
 * No fresh or stale entry exists and the underlying fetch failed.
 */
export class CacheMissError extends UpstreamUnavailableError {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super(`No cached data for ${key} and the upstream fetch failed`, { cause, code: 'CACHE_MISS' });
    this.key = key;
  }
}

export type StatSourceErrorKind = 'RateLimited' | 'NotFound' | 'Unavailable';

export class StatSourceError extends EngineError {
  readonly kind: StatSourceErrorKind;

  constructor(kind: StatSourceErrorKind, message: string, options?: { cause?: unknown }) {
    super('STAT_SOURCE', message, 502, options);
    this.kind = kind;
  }
}

export class ConfigError extends EngineError {
  readonly invalid: string[];

  constructor(invalid: string[]) {
    super('CONFIG', `Invalid configuration:\n${invalid.map(v => `  - ${v}`).join('\n')}`, 500);
    this.invalid = invalid;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Render any thrown value as a JSON body and status for an API response.
 */
export function toErrorResponse(error: unknown): { body: { error: string; code: string }; status: number } {
  if (isEngineError(error)) {
    return { body: { error: error.message, code: error.code }, status: error.status };
  }
  return { body: { error: 'Internal server error', code: 'INTERNAL' }, status: 500 };
}
