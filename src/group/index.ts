/**
 * Task Group
 * Exports the group primitive, its deadline helper and error types
 */

export { TaskGroup } from './task-group.js';
export { createDeadline, deadline } from './deadline.js';
export type { Deadline } from './deadline.js';
export {
  GroupCancelledError,
  DeadlineExceededError,
  WaitAbortedError,
  toWaitError,
} from './errors.js';
export type {
  TaskFn,
  GroupState,
  ErrorPrecedence,
  TaskGroupConfig,
  GroupMessage,
} from './types.js';
