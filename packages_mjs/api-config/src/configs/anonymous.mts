import type { Dispatcher } from 'undici';
import type { Config, EndpointResolver } from '@apikit/api-client';

/**
 * Configuration without authorization: requests go out on the base
 * dispatcher unchanged.
 */
export class AnonymousConfig implements Config {
  constructor(private readonly resolver: EndpointResolver) { }

  endpoints(): EndpointResolver {
    return this.resolver;
  }

  async authorize(dispatcher: Dispatcher): Promise<Dispatcher> {
    return dispatcher;
  }
}
