/**
 * Configuration utilities for @apikit/api-client
 */
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { CreateClientOptions } from './types.mjs';
import { ConfigurationError } from './errors.mjs';
import { logger as defaultLogger } from './logger.mjs';

/**
 * Default client-wide request timeout in milliseconds
 */
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Client options with defaults applied
 */
export interface ResolvedClientOptions {
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Validate a timeout value in milliseconds
 */
export function validateTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Invalid timeoutMs: ${timeoutMs}. Must be a positive number of milliseconds`);
  }
}

/**
 * Resolve client options with defaults
 */
export function resolveClientOptions(options: CreateClientOptions = {}): ResolvedClientOptions {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  validateTimeout(timeoutMs);

  return {
    dispatcher: options.dispatcher,
    signal: options.signal,
    timeoutMs,
    logger: options.logger ?? defaultLogger,
  };
}
