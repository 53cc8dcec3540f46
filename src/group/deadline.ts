import { DeadlineExceededError } from './errors.js';

export interface Deadline {
  signal: AbortSignal;
  /** Stop the timer and detach from the parent signal */
  dispose(): void;
}

/**
 * Create a wait signal that aborts with a DeadlineExceededError after
 * `timeoutMs`, or earlier with the parent's reason if `parent` aborts first.
 * Call `dispose` once the wait is over to release a long-lived parent.
 *
 * Like `AbortSignal.timeout`, the timer does not keep the process alive.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();

  if (parent?.aborted) {
    controller.abort(parent.reason);
    return { signal: controller.signal, dispose: () => {} };
  }

  const onParentAbort = () => controller.abort(parent?.reason);
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
  timer.unref();

  const dispose = () => {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  };

  parent?.addEventListener('abort', onParentAbort, { once: true });
  controller.signal.addEventListener('abort', dispose, { once: true });

  return { signal: controller.signal, dispose };
}

/**
 * Shorthand for `createDeadline(...).signal`, for one-off waits.
 */
export function deadline(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  return createDeadline(timeoutMs, parent).signal;
}
