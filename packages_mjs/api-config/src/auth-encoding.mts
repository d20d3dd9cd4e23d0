/**
 * Authorization header encoding
 */
import { ConfigurationError } from '@apikit/api-client';
import type { AuthCredentials } from './types.mjs';

function b64(str: string): string {
  return Buffer.from(str).toString('base64');
}

/**
 * Encode credentials as the header(s) to send with every request
 */
export function encodeAuthHeader(creds: AuthCredentials): Record<string, string> {
  switch (creds.type) {
    case 'basic': {
      const user = creds.username || creds.email;
      const pass = creds.password || creds.token;
      if (!user || !pass) {
        throw new ConfigurationError('basic auth requires (username OR email) AND (password OR token)');
      }
      return { Authorization: `Basic ${b64(`${user}:${pass}`)}` };
    }

    case 'bearer': {
      if (!creds.token) {
        throw new ConfigurationError('bearer auth requires token');
      }
      // Pre-encoded values pass through untouched
      if (creds.token.startsWith('Bearer ')) {
        return { Authorization: creds.token };
      }
      return { Authorization: `Bearer ${creds.token}` };
    }

    case 'x-api-key':
      if (!creds.token) {
        throw new ConfigurationError('x-api-key auth requires token');
      }
      return { 'X-API-Key': creds.token };

    case 'custom':
      if (!creds.headerName) {
        throw new ConfigurationError('custom auth requires headerName');
      }
      if (!creds.token) {
        throw new ConfigurationError('custom auth requires token');
      }
      return { [creds.headerName]: creds.token };

    default:
      throw new ConfigurationError(`Unsupported auth type: ${String(creds.type)}`);
  }
}
