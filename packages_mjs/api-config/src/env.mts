/**
 * Build a Config from environment variables
 *
 * APIKIT_BASE_URL        base URL endpoints resolve against (required)
 * APIKIT_AUTH_TYPE       none | basic | bearer | x-api-key | custom | oauth2 (default: none)
 * APIKIT_TOKEN           token for bearer, x-api-key and custom; password fallback for basic
 * APIKIT_USERNAME        basic auth user
 * APIKIT_PASSWORD        basic auth password
 * APIKIT_HEADER_NAME     header for custom auth
 * APIKIT_OAUTH2_TOKEN_URL, APIKIT_CLIENT_ID, APIKIT_CLIENT_SECRET, APIKIT_OAUTH2_SCOPES
 *                        oauth2 client credentials (scopes space separated)
 */
import { ConfigurationError, type Config } from '@apikit/api-client';
import type { AuthScheme } from './types.mjs';
import { baseUrlEndpoints } from './endpoints.mjs';
import { AnonymousConfig } from './configs/anonymous.mjs';
import { StaticAuthConfig } from './configs/static-auth.mjs';
import { OAuth2ClientCredentialsConfig } from './configs/oauth2.mjs';

export const ENV_AUTH_TYPES = ['none', 'basic', 'bearer', 'x-api-key', 'custom', 'oauth2'] as const;

export type EnvAuthType = (typeof ENV_AUTH_TYPES)[number];

function isEnvAuthType(value: string): value is EnvAuthType {
  return ENV_AUTH_TYPES.some((type) => type === value);
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} is required`);
  }
  return value;
}

/**
 * Create a Config from `env`
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const endpoints = baseUrlEndpoints(required(env, 'APIKIT_BASE_URL'));
  const authType = (env.APIKIT_AUTH_TYPE || 'none').toLowerCase();

  if (!isEnvAuthType(authType)) {
    throw new ConfigurationError(
      `Invalid APIKIT_AUTH_TYPE: ${authType}. Must be one of: ${[...ENV_AUTH_TYPES].sort().join(', ')}`
    );
  }

  if (authType === 'none') {
    return new AnonymousConfig(endpoints);
  }

  if (authType === 'oauth2') {
    return new OAuth2ClientCredentialsConfig({
      endpoints,
      tokenUrl: required(env, 'APIKIT_OAUTH2_TOKEN_URL'),
      clientId: required(env, 'APIKIT_CLIENT_ID'),
      clientSecret: required(env, 'APIKIT_CLIENT_SECRET'),
      scopes: env.APIKIT_OAUTH2_SCOPES?.split(/\s+/).filter(Boolean),
    });
  }

  const scheme: AuthScheme = authType;
  return new StaticAuthConfig({
    endpoints,
    auth: {
      type: scheme,
      username: env.APIKIT_USERNAME || undefined,
      password: env.APIKIT_PASSWORD || undefined,
      token: env.APIKIT_TOKEN || undefined,
      headerName: env.APIKIT_HEADER_NAME || undefined,
    },
  });
}
