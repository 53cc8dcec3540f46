/**
 * Task Group Errors
 * Error types produced by the group itself. Errors thrown by tasks are passed
 * through untouched.
 */

/**
 * Abort reason used when a group is cancelled without an explicit reason.
 */
export class GroupCancelledError extends Error {
  constructor(groupName?: string) {
    super(groupName ? `task group "${groupName}" was cancelled` : 'task group was cancelled');
    this.name = 'GroupCancelledError';
  }
}

/**
 * Raised by signals created with `deadline()` once their time is up.
 */
export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`deadline exceeded after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps a wait signal's abort reason when that reason is not an Error.
 */
export class WaitAbortedError extends Error {
  readonly reason: unknown;

  constructor(reason: unknown) {
    super(`wait aborted: ${String(reason)}`);
    this.name = 'WaitAbortedError';
    this.reason = reason;
  }
}

/**
 * Turn an AbortSignal's reason into the error `wait()` reports.
 */
export function toWaitError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new WaitAbortedError(reason);
}
