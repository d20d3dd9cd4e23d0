/**
 * Auth header interceptor for undici's compose pattern
 */
import type { Dispatcher } from 'undici';

type HeaderValue = string | string[];

/**
 * Flatten dispatch headers (object, flat array or iterable form) into a
 * name/value list
 */
export function headerEntries(
  headers: Dispatcher.DispatchOptions['headers']
): Array<[string, HeaderValue]> {
  const entries: Array<[string, HeaderValue]> = [];
  if (!headers) return entries;

  if (Array.isArray(headers)) {
    for (let i = 0; i + 1 < headers.length; i += 2) {
      entries.push([String(headers[i]), String(headers[i + 1])]);
    }
    return entries;
  }

  if (Symbol.iterator in headers) {
    for (const [key, value] of headers) {
      if (value !== undefined) {
        entries.push([key, value]);
      }
    }
    return entries;
  }

  for (const key of Object.keys(headers)) {
    const value = headers[key];
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * Return `headers` with every name in `overrides` replaced (case-insensitive)
 */
export function setHeaders(
  headers: Dispatcher.DispatchOptions['headers'],
  overrides: Record<string, string>
): Record<string, HeaderValue> {
  const overridden = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));
  const result: Record<string, HeaderValue> = {};

  for (const [key, value] of headerEntries(headers)) {
    if (!overridden.has(key.toLowerCase())) {
      result[key] = value;
    }
  }

  return { ...result, ...overrides };
}

/**
 * Create an interceptor that sets the given headers on every request
 *
 * @param headers - Headers to set, or a function producing them per request
 * @returns Dispatcher compose interceptor
 *
 * @example
 * const dispatcher = new Agent().compose(
 *   authHeaderInterceptor({ Authorization: 'Bearer test-token' })
 * );
 */
export function authHeaderInterceptor(
  headers: Record<string, string> | (() => Record<string, string>)
): Dispatcher.DispatcherComposeInterceptor {
  return (dispatch: Dispatcher.Dispatch) => {
    return (
      opts: Dispatcher.DispatchOptions,
      handler: Dispatcher.DispatchHandler
    ): boolean => {
      const authHeaders = typeof headers === 'function' ? headers() : headers;
      return dispatch({ ...opts, headers: setHeaders(opts.headers, authHeaders) }, handler);
    };
  };
}
