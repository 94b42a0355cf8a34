/**
 * Cancellable unit of background work
 */

export interface PipelineTask<T> {
  readonly promise: Promise<T>;
  readonly signal: AbortSignal;
  readonly running: boolean;
  cancel(): void;
}

/**
 * Start `work` on a later tick so the caller gets the handle (and can wire
 * up cancellation) before the first filesystem call is made.
 */
export function startTask<T>(work: (signal: AbortSignal) => Promise<T>): PipelineTask<T> {
  const controller = new AbortController();
  let running = true;

  const promise = Promise.resolve()
    .then(() => work(controller.signal))
    .finally(() => {
      running = false;
    });

  return {
    promise,
    signal: controller.signal,
    get running() {
      return running;
    },
    cancel() {
      controller.abort();
    },
  };
}
