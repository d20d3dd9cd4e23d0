/**
 * API client bound to one dispatcher and one endpoint resolver
 */
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type {
  ApiClient,
  ApiRequest,
  ApiResponse,
  DoOptions,
  EndpointResolver,
} from '../types.mjs';
import { TransportError } from '../errors.mjs';
import { executeRequest, type ExecutorContext } from './executor.mjs';
import { closeOnce } from './task.mjs';

export interface HttpApiClientInit {
  /** Dispatcher every request goes through (usually the authorized one) */
  dispatcher: Dispatcher;
  endpoints: EndpointResolver;
  timeoutMs: number;
  logger: Logger;
  /** Dispatcher created by the factory and released by close() */
  ownedDispatcher?: Dispatcher;
}

/**
 * Default ApiClient implementation.
 *
 * Everything it holds is fixed at construction, so one instance can serve
 * any number of concurrent calls.
 */
export class HttpApiClient implements ApiClient {
  public readonly timeoutMs: number;
  private readonly context: ExecutorContext;
  private readonly endpoints: EndpointResolver;
  private readonly release: () => Promise<void>;
  private closed = false;

  constructor(init: HttpApiClientInit) {
    this.timeoutMs = init.timeoutMs;
    this.endpoints = init.endpoints;
    this.context = Object.freeze({
      dispatcher: init.dispatcher,
      timeoutMs: init.timeoutMs,
      logger: init.logger,
    });

    const owned = init.ownedDispatcher;
    this.release = closeOnce(async () => {
      if (owned) {
        await owned.close();
      }
    });
  }

  /**
   * Resolve an endpoint to a fully qualified URL
   */
  url(endpoint: string): URL | undefined {
    return this.endpoints(endpoint);
  }

  /**
   * Perform the request and buffer its body
   */
  async do(request: ApiRequest, options: DoOptions = {}): Promise<ApiResponse> {
    if (this.closed) {
      throw new TransportError('Client has been closed');
    }
    return executeRequest(this.context, request, options);
  }

  /**
   * Close the client
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.release();
  }
}
