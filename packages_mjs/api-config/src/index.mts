/**
 * @apikit/api-config
 *
 * Config implementations for @apikit/api-client: endpoint resolvers and
 * authorization (anonymous, static credentials, OAuth2 client credentials).
 */

// Types
export type {
  AuthScheme,
  AuthCredentials,
  StaticAuthConfigOptions,
  OAuth2ClientCredentialsOptions,
  OAuth2Token,
} from './types.mjs';

// Endpoints
export { baseUrlEndpoints, mappedEndpoints } from './endpoints.mjs';

// Auth
export { encodeAuthHeader } from './auth-encoding.mjs';
export { authHeaderInterceptor, setHeaders, headerEntries } from './auth-interceptor.mjs';

// Configs
export { AnonymousConfig } from './configs/anonymous.mjs';
export { StaticAuthConfig } from './configs/static-auth.mjs';
export { OAuth2ClientCredentialsConfig, parseTokenResponse } from './configs/oauth2.mjs';

// Environment
export { configFromEnv, ENV_AUTH_TYPES, type EnvAuthType } from './env.mjs';
