/**
 * Task Group Types
 */

/**
 * A unit of work. It receives the group's shared cancellation signal and fails
 * by throwing or rejecting.
 */
export type TaskFn = (signal: AbortSignal) => void | Promise<void>;

export type GroupState = 'idle' | 'launching' | 'settling' | 'settled';

/**
 * Which error `wait()` reports when a task failed and the wait deadline also
 * elapsed.
 */
export type ErrorPrecedence = 'task' | 'deadline';

export interface TaskGroupConfig {
  name?: string;
  verbose?: boolean;
  errorPrecedence?: ErrorPrecedence;
}

export interface GroupMessage {
  type:
    | 'task-start'
    | 'task-complete'
    | 'task-error'
    | 'task-skipped'
    | 'group-cancel'
    | 'group-settled';
  group: string;
  taskId?: number;
  running: number;
  error?: unknown;
}
