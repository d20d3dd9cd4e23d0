/**
 * Logging for @apikit/api-client
 */
import pino, { type Logger, type LoggerOptions } from 'pino';

const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'x-api-key', 'cookie', 'set-cookie'];

/**
 * Create the module logger.
 *
 * APIKIT_LOG_LEVEL sets the level (default: warn). APIKIT_LOG_PRETTY=true
 * routes output through pino-pretty.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = {
    name: 'apikit',
    level: env.APIKIT_LOG_LEVEL || 'warn',
  };

  if (env.APIKIT_LOG_PRETTY === 'true') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    };
  }

  return pino(options);
}

export const logger = createLogger();

/**
 * Mask a secret, keeping the first 10 characters
 */
export function maskValue(value: string | undefined): string {
  if (!value) return '<empty>';
  if (value.length <= 10) return '*'.repeat(value.length);
  return value.slice(0, 10) + '*'.repeat(value.length - 10);
}

/**
 * Mask credential-bearing headers for safe logging
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked = { ...headers };
  for (const key of Object.keys(masked)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      masked[key] = maskValue(masked[key]);
    }
  }
  return masked;
}
