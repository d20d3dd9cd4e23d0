/**
 * Error taxonomy for @apikit/api-client
 *
 * Every failure the client reports is an ApiClientError tagged with the stage
 * it happened at. The underlying error is kept unchanged as `cause`.
 */
import type { ResponseMeta } from './types.mjs';

export type ApiClientErrorKind = 'configuration' | 'transport' | 'cancellation' | 'read';

export interface ApiClientErrorOptions {
  cause?: unknown;
  response?: ResponseMeta;
}

export class ApiClientError extends Error {
  public readonly kind: ApiClientErrorKind;
  public readonly response?: ResponseMeta;

  constructor(kind: ApiClientErrorKind, message: string, options: ApiClientErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ApiClientError';
    this.kind = kind;
    this.response = options.response;
  }
}

/**
 * Authorization setup or endpoint resolution failed while building a client
 */
export class ConfigurationError extends ApiClientError {
  constructor(message: string, options: ApiClientErrorOptions = {}) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The round trip failed before a response was obtained
 */
export class TransportError extends ApiClientError {
  constructor(message: string, options: ApiClientErrorOptions = {}) {
    super('transport', message, options);
    this.name = 'TransportError';
  }
}

export type CancellationPhase = 'request' | 'body';

/**
 * The caller's signal aborted the call. `cause` is the signal's reason.
 */
export class CancellationError extends ApiClientError {
  public readonly phase: CancellationPhase;

  constructor(phase: CancellationPhase, options: ApiClientErrorOptions = {}) {
    super('cancellation', `Request cancelled during ${phase === 'request' ? 'request' : 'body read'}`, options);
    this.name = 'CancellationError';
    this.phase = phase;
  }
}

/**
 * Reading or closing the response body failed
 */
export class ReadError extends ApiClientError {
  constructor(message: string, options: ApiClientErrorOptions = {}) {
    super('read', message, options);
    this.name = 'ReadError';
  }
}

export function isApiClientError(error: unknown): error is ApiClientError {
  return error instanceof ApiClientError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

export function isReadError(error: unknown): error is ReadError {
  return error instanceof ReadError;
}

/**
 * True when the error, or any error in its cause chain, is a timeout abort
 * (the client timeout or an `AbortSignal.timeout` supplied by the caller).
 */
export function isTimeoutError(error: unknown): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current instanceof Error && !seen.has(current)) {
    if (current.name === 'TimeoutError') {
      return true;
    }
    seen.add(current);
    current = current.cause;
  }

  return false;
}

/**
 * Describe an unknown thrown value for error messages
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
