/**
 * @apikit/api-client
 *
 * Minimal API client: a Config supplies endpoint resolution and an
 * authorizing undici dispatcher; the client executes requests with a fixed
 * timeout and cancellation-safe body buffering.
 *
 * @example
 * ```typescript
 * import { createClient } from '@apikit/api-client';
 * import { StaticAuthConfig, baseUrlEndpoints } from '@apikit/api-config';
 *
 * const client = await createClient(
 *   new StaticAuthConfig({
 *     endpoints: baseUrlEndpoints('https://api.example.com/v1/'),
 *     auth: { type: 'bearer', token: process.env.API_TOKEN },
 *   })
 * );
 *
 * const controller = new AbortController();
 * const url = client.url('users');
 * if (url) {
 *   const response = await client.do({ url }, { signal: controller.signal });
 *   console.log(JSON.parse(response.body.toString('utf8')));
 * }
 *
 * await client.close();
 * ```
 */

// Types
export type {
  HttpMethod,
  EndpointResolver,
  Config,
  CreateClientOptions,
  ApiRequest,
  DoOptions,
  ResponseMeta,
  ApiResponse,
  ApiClient,
} from './types.mjs';

// Config
export {
  DEFAULT_TIMEOUT_MS,
  validateTimeout,
  resolveClientOptions,
  type ResolvedClientOptions,
} from './config.mjs';

// Errors
export {
  ApiClientError,
  ConfigurationError,
  TransportError,
  CancellationError,
  ReadError,
  isApiClientError,
  isConfigurationError,
  isTransportError,
  isCancellationError,
  isReadError,
  isTimeoutError,
  describeError,
  type ApiClientErrorKind,
  type ApiClientErrorOptions,
  type CancellationPhase,
} from './errors.mjs';

// Logging
export { createLogger, logger, maskValue, maskHeaders } from './logger.mjs';

// Factory
export { createClient } from './factory.mjs';

// Core (for advanced usage)
export { HttpApiClient, type HttpApiClientInit } from './core/api-client.mjs';
export {
  executeRequest,
  withTimeout,
  flattenHeaders,
  type ExecutorContext,
} from './core/executor.mjs';
export {
  spawnTask,
  raceAbort,
  closeOnce,
  type Task,
  type Settled,
  type RaceResult,
} from './core/task.mjs';
