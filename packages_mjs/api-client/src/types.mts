/**
 * Type definitions for @apikit/api-client
 */
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';

/**
 * HTTP methods
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Resolves a logical endpoint name to a concrete location
 */
export type EndpointResolver = (endpoint: string) => URL | undefined;

/**
 * Configuration capability consumed by the client factory.
 *
 * Implementations decide how endpoints are located and how requests are
 * authorized (anonymous, static credentials, OAuth2, ...). The client never
 * inspects them beyond these two operations.
 */
export interface Config {
  /** Returns a resolver for the location of a named endpoint. */
  endpoints(): EndpointResolver | Promise<EndpointResolver>;
  /**
   * Returns a dispatcher that applies this configuration's authorization on
   * top of `dispatcher`. The signal covers any request needed to obtain
   * credentials. Configurations without authorization may return the input
   * dispatcher as-is.
   */
  authorize(dispatcher: Dispatcher, signal?: AbortSignal): Promise<Dispatcher>;
}

/**
 * Options for createClient
 */
export interface CreateClientOptions {
  /** Base dispatcher. Default: a new undici Agent owned by the client */
  dispatcher?: Dispatcher;
  /** Signal observed by the authorization handshake */
  signal?: AbortSignal;
  /** Client-wide request timeout in ms. Default: 10000 */
  timeoutMs?: number;
  /** Logger for request diagnostics. Default: module logger */
  logger?: Logger;
}

/**
 * A fully formed request
 */
export interface ApiRequest {
  method?: HttpMethod;
  url: URL | string;
  headers?: Record<string, string>;
  body?: string | Buffer | Uint8Array;
}

/**
 * Per-call options
 */
export interface DoOptions {
  /** Cancels the call; absent means only the client timeout applies */
  signal?: AbortSignal;
}

/**
 * Status line and headers of a response
 */
export interface ResponseMeta {
  statusCode: number;
  headers: Record<string, string>;
}

/**
 * A response whose body has been read in full
 */
export interface ApiResponse extends ResponseMeta {
  body: Buffer;
}

/**
 * API client interface
 */
export interface ApiClient {
  /** Effective client-wide timeout in ms */
  readonly timeoutMs: number;
  /** Location of the named endpoint */
  url(endpoint: string): URL | undefined;
  /** Performs the request and buffers the response body */
  do(request: ApiRequest, options?: DoOptions): Promise<ApiResponse>;
  /** Releases connections held by a client-owned dispatcher */
  close(): Promise<void>;
}
