/**
 * Spawn/join primitives for work that must finish before its caller returns
 */

/**
 * Outcome of a task, success or failure
 */
export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Handle to work started by spawnTask
 */
export interface Task<T> {
  /** Resolves once the work has finished. Never rejects. */
  join(): Promise<Settled<T>>;
  /** True once the work has finished */
  readonly done: boolean;
}

/**
 * Start `fn` on the next microtask and return a handle to its outcome
 */
export function spawnTask<T>(fn: () => Promise<T>): Task<T> {
  let done = false;

  const settled: Promise<Settled<T>> = Promise.resolve()
    .then(fn)
    .then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error })
    )
    .finally(() => {
      done = true;
    });

  return {
    join: () => settled,
    get done() {
      return done;
    },
  };
}

export type RaceResult<T> =
  | { winner: 'task'; settled: Settled<T> }
  | { winner: 'signal' };

/**
 * Wait for whichever comes first: the task finishing or the signal aborting.
 *
 * The abort listener is removed before this resolves. The task keeps running
 * when the signal wins; callers still have to join it.
 */
export function raceAbort<T>(task: Task<T>, signal: AbortSignal): Promise<RaceResult<T>> {
  if (signal.aborted) {
    return Promise.resolve({ winner: 'signal' });
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      resolve({ winner: 'signal' });
    };

    signal.addEventListener('abort', onAbort, { once: true });

    void task.join().then((settled) => {
      signal.removeEventListener('abort', onAbort);
      resolve({ winner: 'task', settled });
    });
  });
}

/**
 * Wrap a close operation so that it runs at most once. Later calls return the
 * first call's promise.
 */
export function closeOnce(close: () => void | Promise<void>): () => Promise<void> {
  let closing: Promise<void> | undefined;

  return () => {
    if (!closing) {
      closing = Promise.resolve().then(close);
    }
    return closing;
  };
}
