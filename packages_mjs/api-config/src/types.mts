/**
 * Type definitions for @apikit/api-config
 */
import type { Logger } from 'pino';
import type { EndpointResolver } from '@apikit/api-client';

/**
 * Supported static authorization schemes
 *
 * - basic: Authorization: Basic <base64((username|email):(password|token))>
 * - bearer: Authorization: Bearer <token>
 * - x-api-key: X-API-Key: <token>
 * - custom: <headerName>: <token>
 */
export type AuthScheme = 'basic' | 'bearer' | 'x-api-key' | 'custom';

/**
 * Static credentials
 */
export interface AuthCredentials {
  type: AuthScheme;
  username?: string;
  email?: string;
  password?: string;
  token?: string;
  /** Header name for the custom scheme */
  headerName?: string;
}

/**
 * Options for StaticAuthConfig
 */
export interface StaticAuthConfigOptions {
  endpoints: EndpointResolver;
  auth: AuthCredentials;
  /** Logger for authorization events. Default: the @apikit/api-client logger */
  logger?: Logger;
}

/**
 * Options for OAuth2ClientCredentialsConfig
 */
export interface OAuth2ClientCredentialsOptions {
  endpoints: EndpointResolver;
  tokenUrl: string | URL;
  clientId: string;
  clientSecret: string;
  scopes?: string[];
  /** Timeout for the token request in ms. Default: 10000 */
  timeoutMs?: number;
  /** Logger for the token request. Default: the @apikit/api-client logger */
  logger?: Logger;
}

/**
 * Access token obtained from a token endpoint
 */
export interface OAuth2Token {
  accessToken: string;
  tokenType: string;
  /** Lifetime in seconds as reported by the server */
  expiresIn?: number;
  scope?: string;
}
