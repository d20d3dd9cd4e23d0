import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_TIMEOUT_MS,
  describeError,
  executeRequest,
  logger as defaultLogger,
  maskValue,
  validateTimeout,
  type ApiResponse,
  type Config,
  type EndpointResolver,
} from '@apikit/api-client';
import type { OAuth2ClientCredentialsOptions, OAuth2Token } from '../types.mjs';
import { encodeAuthHeader } from '../auth-encoding.mjs';
import { authHeaderInterceptor } from '../auth-interceptor.mjs';

const TokenPayloadSchema = z.object({
  access_token: z
    .string({ required_error: 'access_token is required' })
    .min(1, 'access_token is empty'),
  token_type: z.string().optional(),
  expires_in: z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]).optional(),
  scope: z.string().optional(),
});

/**
 * Parse a token endpoint response
 */
export function parseTokenResponse(response: ApiResponse): OAuth2Token {
  const text = response.body.toString('utf8');

  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new ConfigurationError(`Token request failed with HTTP ${response.statusCode}: ${text}`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError('Token response is not valid JSON', { cause: error });
  }

  const parsed = TokenPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid token response: ${issues}`, { cause: parsed.error });
  }
  const { data } = parsed;

  const tokenType = data.token_type ?? 'Bearer';
  if (tokenType.toLowerCase() !== 'bearer') {
    throw new ConfigurationError(`Unsupported token_type: ${tokenType}`);
  }

  return {
    accessToken: data.access_token,
    tokenType,
    expiresIn: data.expires_in,
    scope: data.scope,
  };
}

/**
 * Configuration that exchanges client credentials for a bearer token
 * (OAuth2 client_credentials grant) when the client is created.
 *
 * The token is requested once per authorize() call; build a new client to
 * pick up a fresh token.
 */
export class OAuth2ClientCredentialsConfig implements Config {
  private readonly options: OAuth2ClientCredentialsOptions;
  private readonly tokenUrl: URL;
  private readonly logger: Logger;

  constructor(options: OAuth2ClientCredentialsOptions) {
    if (!options.clientId) {
      throw new ConfigurationError('clientId is required for oauth2 client credentials');
    }
    if (!options.clientSecret) {
      throw new ConfigurationError('clientSecret is required for oauth2 client credentials');
    }
    if (options.timeoutMs !== undefined) {
      validateTimeout(options.timeoutMs);
    }
    try {
      this.tokenUrl = new URL(options.tokenUrl.toString());
    } catch (error) {
      throw new ConfigurationError(`Invalid tokenUrl: ${options.tokenUrl.toString()}`, { cause: error });
    }
    this.options = { ...options };
    this.logger = options.logger ?? defaultLogger;
  }

  endpoints(): EndpointResolver {
    return this.options.endpoints;
  }

  /**
   * Request an access token through `dispatcher`
   */
  async fetchToken(dispatcher: Dispatcher, signal?: AbortSignal): Promise<OAuth2Token> {
    const { clientId, clientSecret, scopes } = this.options;
    const form = new URLSearchParams({ grant_type: 'client_credentials' });
    if (scopes && scopes.length > 0) {
      form.set('scope', scopes.join(' '));
    }

    let response: ApiResponse;
    try {
      response = await executeRequest(
        {
          dispatcher,
          timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
          logger: this.logger,
        },
        {
          method: 'POST',
          url: this.tokenUrl,
          headers: {
            ...encodeAuthHeader({ type: 'basic', username: clientId, password: clientSecret }),
            'content-type': 'application/x-www-form-urlencoded',
            accept: 'application/json',
          },
          body: form.toString(),
        },
        { signal }
      );
    } catch (error) {
      throw new ConfigurationError(`Token request failed: ${describeError(error)}`, { cause: error });
    }

    return parseTokenResponse(response);
  }

  async authorize(dispatcher: Dispatcher, signal?: AbortSignal): Promise<Dispatcher> {
    const token = await this.fetchToken(dispatcher, signal);

    this.logger.debug({
      tokenUrl: this.tokenUrl.href,
      clientId: this.options.clientId,
      accessToken: maskValue(token.accessToken),
      expiresIn: token.expiresIn,
    }, 'OAuth2 token acquired');

    return dispatcher.compose(authHeaderInterceptor({ Authorization: `Bearer ${token.accessToken}` }));
  }
}
