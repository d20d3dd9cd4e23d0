import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { logger as defaultLogger, maskValue, type Config, type EndpointResolver } from '@apikit/api-client';
import type { AuthCredentials, StaticAuthConfigOptions } from '../types.mjs';
import { encodeAuthHeader } from '../auth-encoding.mjs';
import { authHeaderInterceptor } from '../auth-interceptor.mjs';

/**
 * Configuration that sends fixed credentials (basic, bearer, API key or a
 * custom header) with every request.
 */
export class StaticAuthConfig implements Config {
  private readonly resolver: EndpointResolver;
  private readonly auth: AuthCredentials;
  private readonly logger: Logger;

  constructor(options: StaticAuthConfigOptions) {
    this.resolver = options.endpoints;
    this.auth = { ...options.auth };
    this.logger = options.logger ?? defaultLogger;
  }

  endpoints(): EndpointResolver {
    return this.resolver;
  }

  async authorize(dispatcher: Dispatcher): Promise<Dispatcher> {
    const headers = encodeAuthHeader(this.auth);

    this.logger.debug({
      type: this.auth.type,
      headers: Object.keys(headers),
      token: maskValue(this.auth.token),
    }, 'Static authorization configured');

    return dispatcher.compose(authHeaderInterceptor(headers));
  }
}
