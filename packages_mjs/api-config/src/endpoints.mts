/**
 * Endpoint resolvers
 */
import { ConfigurationError, type EndpointResolver } from '@apikit/api-client';

function parseUrl(value: string | URL, label: string): URL {
  try {
    return new URL(value.toString());
  } catch (error) {
    throw new ConfigurationError(`Invalid ${label}: ${value.toString()}`, { cause: error });
  }
}

/**
 * Resolve endpoint names relative to a base URL.
 *
 * The base is treated as a directory, so `https://api.example.com/v1` and
 * `https://api.example.com/v1/` both resolve `users` to
 * `https://api.example.com/v1/users`. Leading slashes on the endpoint name
 * are ignored. Names that would leave the base (another origin, or `..`
 * segments climbing above its path) resolve to undefined.
 */
export function baseUrlEndpoints(baseUrl: string | URL): EndpointResolver {
  const base = parseUrl(baseUrl, 'baseUrl');
  if (!base.pathname.endsWith('/')) {
    base.pathname = `${base.pathname}/`;
  }
  const { href, origin, pathname } = base;

  return (endpoint: string) => {
    let resolved: URL;
    try {
      resolved = new URL(endpoint.replace(/^\/+/, ''), href);
    } catch {
      return undefined;
    }
    if (resolved.origin !== origin || !resolved.pathname.startsWith(pathname)) {
      return undefined;
    }
    return resolved;
  };
}

/**
 * Resolve endpoint names from a fixed table. Unknown names resolve to
 * undefined.
 */
export function mappedEndpoints(table: Record<string, string | URL>): EndpointResolver {
  const locations = new Map<string, string>();
  for (const [name, location] of Object.entries(table)) {
    locations.set(name, parseUrl(location, `URL for endpoint "${name}"`).href);
  }

  return (endpoint: string) => {
    const href = locations.get(endpoint);
    return href === undefined ? undefined : new URL(href);
  };
}
