export * from './group/index.js';
export * from './consumer/index.js';
export { runCommands, CommandFailedError } from './commands/run.js';
export type { CommandResult, RunCommandsOptions, RunCommandsSummary } from './commands/run.js';
