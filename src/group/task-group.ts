/**
 * Task Group
 * Launches concurrent tasks that share one cancellation signal, cancels every
 * task as soon as one fails, and joins them all before reporting the outcome.
 */

import { EventEmitter } from 'events';
import { GroupCancelledError, toWaitError } from './errors.js';
import type { ErrorPrecedence, GroupMessage, GroupState, TaskFn, TaskGroupConfig } from './types.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';

interface RecordedError {
  error: unknown;
}

export class TaskGroup extends EventEmitter {
  readonly name: string;
  private readonly controller = new AbortController();
  private readonly errorPrecedence: ErrorPrecedence;
  private readonly logger: Logger;
  private runningCount = 0;
  private launchedCount = 0;
  private nextTaskId = 1;
  private firstError?: RecordedError;
  private settleWaiters: Array<() => void> = [];

  constructor(config: TaskGroupConfig = {}) {
    super();
    this.name = config.name ?? 'group';
    this.errorPrecedence = config.errorPrecedence ?? 'task';
    this.logger = createLogger(`TaskGroup:${this.name}`, config.verbose ?? false);
  }

  /**
   * The cancellation signal shared by every task of this group.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get running(): number {
    return this.runningCount;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * The first task error, if any task has failed so far.
   */
  get error(): unknown {
    return this.firstError?.error;
  }

  get state(): GroupState {
    if (this.runningCount > 0) {
      return this.cancelled ? 'settling' : 'launching';
    }
    return this.launchedCount === 0 && !this.cancelled ? 'idle' : 'settled';
  }

  /**
   * Start each task, in order. Once the group is cancelled, remaining and
   * future tasks are never invoked.
   */
  go(...tasks: TaskFn[]): void {
    for (const task of tasks) {
      if (this.cancelled) {
        this.emitGroupMessage({ type: 'task-skipped' });
        continue;
      }
      this.launch(task);
    }
  }

  /**
   * Ask every running task to stop. Safe to call any number of times; only
   * the first call's reason is kept.
   */
  cancel(reason?: unknown): void {
    if (this.cancelled) return;

    this.controller.abort(reason ?? new GroupCancelledError(this.name));
    this.emitGroupMessage({ type: 'group-cancel', error: reason });
  }

  /**
   * Wait until every launched task has returned.
   *
   * If `signal` aborts first, the group is cancelled and the wait continues
   * until all tasks have stopped; the abort reason is then reported unless a
   * task error takes precedence. Rejects with the first task error otherwise.
   */
  async wait(signal?: AbortSignal): Promise<void> {
    let waitError: Error | undefined;
    if (this.runningCount > 0 && signal) {
      waitError = await this.joinBefore(signal);
    } else if (this.runningCount > 0) {
      await this.whenSettled();
    }

    const taskError = this.firstError;

    if (waitError && (this.errorPrecedence === 'deadline' || !taskError)) {
      throw waitError;
    }
    if (taskError) {
      throw taskError.error;
    }
  }

  private launch(task: TaskFn): void {
    const taskId = this.nextTaskId++;
    this.runningCount++;
    this.launchedCount++;
    this.emitGroupMessage({ type: 'task-start', taskId });

    let pending: Promise<void>;
    try {
      pending = Promise.resolve(task(this.controller.signal));
    } catch (error) {
      pending = Promise.reject(error);
    }

    void pending.then(
      () => this.finish(taskId),
      (error: unknown) => this.finish(taskId, { error }),
    );
  }

  private finish(taskId: number, failure?: RecordedError): void {
    this.runningCount--;

    if (failure) {
      if (this.firstError) {
        this.logger.debug(
          `task ${taskId} failed after the group had already failed: ${describeError(failure.error)}`,
        );
      } else {
        this.firstError = failure;
      }
      this.emitGroupMessage({ type: 'task-error', taskId, error: failure.error });
      this.cancel(failure.error);
    } else {
      this.emitGroupMessage({ type: 'task-complete', taskId });
    }

    if (this.runningCount === 0) {
      const waiters = this.settleWaiters;
      this.settleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
      this.emitGroupMessage({ type: 'group-settled' });
    }
  }

  private whenSettled(): Promise<void> {
    return new Promise((resolve) => {
      this.settleWaiters.push(resolve);
    });
  }

  /**
   * Block until settled, cancelling the group if `signal` aborts first.
   * Returns the wait error in that case.
   */
  private async joinBefore(signal: AbortSignal): Promise<Error | undefined> {
    const settled = this.whenSettled();
    let waitError: Error | undefined;
    const onAbort = () => {
      if (this.runningCount === 0) return;
      waitError = toWaitError(signal);
      this.logger.warn(
        `wait aborted with ${this.runningCount} task(s) running: ${waitError.message}`,
      );
      this.cancel(waitError);
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      await settled;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    return waitError;
  }

  private emitGroupMessage(message: Omit<GroupMessage, 'group' | 'running'>): void {
    const full: GroupMessage = { ...message, group: this.name, running: this.runningCount };
    this.logger.debug(
      `${full.type}${full.taskId === undefined ? '' : ` #${full.taskId}`} (running: ${full.running})`,
    );
    // a throwing listener must not stall the group's bookkeeping
    try {
      this.emit('group-message', full);
    } catch (error) {
      this.logger.error(`group-message listener failed on ${full.type}`, error);
    }
  }
}
