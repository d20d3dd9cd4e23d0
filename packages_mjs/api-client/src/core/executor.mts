/**
 * Cancellation-aware request execution
 */
import { request, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { ApiRequest, ApiResponse, DoOptions, ResponseMeta } from '../types.mjs';
import {
  CancellationError,
  ReadError,
  TransportError,
  describeError,
} from '../errors.mjs';
import { maskHeaders } from '../logger.mjs';
import { closeOnce, raceAbort, spawnTask, type Settled } from './task.mjs';

/**
 * State shared by every call made through one client
 */
export interface ExecutorContext {
  dispatcher: Dispatcher;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Combine the caller's signal with the client timeout
 */
export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Flatten undici response headers
 */
export function flattenHeaders(headers: Dispatcher.ResponseData['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key] = value;
    } else if (Array.isArray(value)) {
      result[key] = value.join(', ');
    }
  }
  return result;
}

/**
 * Execute `req` through the context's dispatcher and buffer the whole body.
 *
 * The body is read on a spawned task that is always joined before this
 * settles, and the body is closed exactly once. When the caller's signal
 * aborts during the read, the call rejects with a CancellationError and the
 * bytes read so far are discarded.
 */
export async function executeRequest(
  ctx: ExecutorContext,
  req: ApiRequest,
  options: DoOptions = {}
): Promise<ApiResponse> {
  const { signal } = options;
  const { logger } = ctx;
  const method = req.method || 'GET';
  const url = req.url.toString();
  const headers = { ...req.headers };
  const startTime = Date.now();

  logger.debug({
    type: 'request',
    method,
    url,
    headers: maskHeaders(headers),
  }, `Request: ${method} ${url}`);

  let response: Dispatcher.ResponseData;
  try {
    response = await request(url, {
      dispatcher: ctx.dispatcher,
      method,
      headers,
      body: req.body,
      signal: withTimeout(signal, ctx.timeoutMs),
    });
  } catch (error) {
    logger.debug({ type: 'error', method, url, err: error }, `Request failed: ${method} ${url}`);
    if (signal?.aborted) {
      throw new CancellationError('request', { cause: signal.reason });
    }
    throw new TransportError(`Request failed: ${method} ${url}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const { body } = response;
  const meta: ResponseMeta = {
    statusCode: response.statusCode,
    headers: flattenHeaders(response.headers),
  };
  const closeBody = closeOnce(() => {
    body.destroy();
  });

  const reading = spawnTask(async () => Buffer.from(await body.arrayBuffer()));

  let settled: Settled<Buffer>;
  if (signal) {
    const race = await raceAbort(reading, signal);
    if (race.winner === 'signal') {
      // The read must finish before we return, even though its result is dropped
      await reading.join();
      try {
        await closeBody();
      } catch (closeError) {
        throw new ReadError(`Failed to close response body: ${describeError(closeError)}`, {
          cause: closeError,
          response: meta,
        });
      }
      logger.debug({ type: 'cancelled', method, url, status: meta.statusCode }, `Cancelled: ${method} ${url}`);
      throw new CancellationError('body', { cause: signal.reason, response: meta });
    }
    settled = race.settled;
  } else {
    settled = await reading.join();
  }

  await closeBody().catch((closeError: unknown) => {
    logger.warn({ err: closeError, method, url }, 'Failed to close response body');
  });

  if (!settled.ok) {
    logger.debug({ type: 'error', method, url, err: settled.error }, `Body read failed: ${method} ${url}`);
    throw new ReadError(`Failed to read response body: ${describeError(settled.error)}`, {
      cause: settled.error,
      response: meta,
    });
  }

  const isOk = meta.statusCode >= 200 && meta.statusCode < 300;
  logger.debug({
    type: 'response',
    status: meta.statusCode,
    headers: maskHeaders(meta.headers),
    bytes: settled.value.length,
    durationMs: Date.now() - startTime,
    ok: isOk,
  }, `Response: ${meta.statusCode}`);

  return { ...meta, body: settled.value };
}
