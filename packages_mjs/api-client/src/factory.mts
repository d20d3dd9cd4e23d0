/**
 * Client factory for @apikit/api-client
 */
import { Agent, type Dispatcher } from 'undici';
import type { ApiClient, Config, CreateClientOptions, EndpointResolver } from './types.mjs';
import { resolveClientOptions } from './config.mjs';
import { ConfigurationError, describeError, isConfigurationError } from './errors.mjs';
import { HttpApiClient } from './core/api-client.mjs';

function toConfigurationError(stage: string, error: unknown): ConfigurationError {
  if (isConfigurationError(error)) {
    return error;
  }
  return new ConfigurationError(`${stage} failed: ${describeError(error)}`, { cause: error });
}

/**
 * Create an API client from a configuration.
 *
 * Authorization runs once, here, and may itself make requests (a token
 * exchange for instance); `options.signal` bounds them. Without
 * `options.dispatcher` the client creates an undici Agent and releases it on
 * close().
 *
 * @example
 * ```typescript
 * const client = await createClient(new AnonymousConfig(baseUrlEndpoints('https://api.example.com')));
 *
 * const response = await client.do({ method: 'GET', url: 'https://api.example.com/users' });
 * console.log(response.statusCode, response.body.toString());
 * ```
 */
export async function createClient(
  config: Config,
  options: CreateClientOptions = {}
): Promise<ApiClient> {
  const resolved = resolveClientOptions(options);
  let ownedDispatcher: Agent | undefined;
  let base: Dispatcher;
  if (resolved.dispatcher) {
    base = resolved.dispatcher;
  } else {
    ownedDispatcher = new Agent();
    base = ownedDispatcher;
  }

  let dispatcher: Dispatcher;
  let endpoints: EndpointResolver;

  try {
    try {
      dispatcher = await config.authorize(base, resolved.signal);
    } catch (error) {
      throw toConfigurationError('Authorization', error);
    }

    try {
      endpoints = await config.endpoints();
    } catch (error) {
      throw toConfigurationError('Endpoint resolution', error);
    }
  } catch (error) {
    if (ownedDispatcher) {
      await ownedDispatcher.close();
    }
    throw error;
  }

  resolved.logger.debug({ timeoutMs: resolved.timeoutMs, ownsDispatcher: Boolean(ownedDispatcher) }, 'Client created');

  return new HttpApiClient({
    dispatcher,
    endpoints,
    timeoutMs: resolved.timeoutMs,
    logger: resolved.logger,
    ownedDispatcher,
  });
}
