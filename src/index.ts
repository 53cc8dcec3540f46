#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { clearConfig, getConfig, parseErrorPrecedence, setConfig } from './config.js';
import { runCommands } from './commands/run.js';
import type { CommandResult } from './commands/run.js';
import {
  formatCancelled,
  formatCode,
  formatDuration,
  formatError,
  formatHeader,
  formatSuccess,
} from './ui/colors.js';
import { describeError } from './utils/logger.js';

interface RunOptions {
  timeout?: string;
  verbose?: boolean;
  precedence?: string;
}

interface ConfigOptions {
  timeout?: string;
  shell?: string;
  verbose?: string;
  precedence?: string;
  show?: boolean;
}

const program = new Command();

program
  .name('conjoin')
  .description('Run commands as one task group: the first failure cancels the rest')
  .version('1.0.0');

program
  .command('run')
  .description('Run shell commands concurrently and wait for all of them to stop')
  .argument('<commands...>', 'Commands to run (quote each one)')
  .option('-t, --timeout <ms>', 'Cancel the remaining commands after this many milliseconds')
  .option('-v, --verbose', 'Log task group activity')
  .option('--precedence <which>', 'Error to report when a command fails and the timeout elapses: task or deadline')
  .action(async (commands: string[], options: RunOptions) => {
    const config = getConfig();
    const timeoutMs = options.timeout ? parseInt(options.timeout, 10) : config.timeoutMs;
    const verbose = options.verbose || config.verbose;

    if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
      console.error(formatError(`Invalid timeout: ${options.timeout}`));
      process.exitCode = 1;
      return;
    }

    const errorPrecedence = options.precedence
      ? parseErrorPrecedence(options.precedence)
      : config.errorPrecedence;
    if (!errorPrecedence) {
      console.error(formatError(`Invalid precedence: ${options.precedence} (use task or deadline)`));
      process.exitCode = 1;
      return;
    }

    const spinner = ora({
      text: `Running ${commands.length} command(s)...`,
      color: 'cyan',
      isEnabled: !verbose,
    }).start();

    const summary = await runCommands(commands, {
      shell: config.shell,
      timeoutMs,
      verbose,
      errorPrecedence,
    });

    spinner.stop();

    console.log(formatHeader('\nResults:'));
    for (const result of summary.results) {
      console.log(formatResult(result));
      if (verbose && result.stdout.trim()) {
        console.log(chalk.dim(indent(result.stdout)));
      }
      if (result.stderr.trim() && (verbose || !isSuccess(result))) {
        console.log(chalk.dim(indent(result.stderr)));
      }
    }

    if (summary.error !== undefined) {
      console.error(formatError(`\nFailed after ${(summary.duration / 1000).toFixed(2)}s: ${describeError(summary.error)}`));
      process.exitCode = 1;
      return;
    }

    console.log(formatSuccess(`\nAll commands completed in ${(summary.duration / 1000).toFixed(2)}s`));
  });

// Config command
program
  .command('config')
  .description('Configure default run settings')
  .option('-t, --timeout <ms>', 'Set default wait timeout (0 = none)')
  .option('--shell <shell>', 'Set shell used to run commands')
  .option('--verbose <bool>', 'Enable or disable verbose logging (true/false)')
  .option('--precedence <which>', 'Set default error precedence: task or deadline')
  .option('--show', 'Show current configuration')
  .action((options: ConfigOptions) => {
    const nothingToSet =
      !options.timeout && !options.shell && !options.verbose && !options.precedence;

    if (options.show || nothingToSet) {
      const config = getConfig();
      console.log(chalk.bold('\nConjoin Configuration:'));
      console.log(chalk.dim(`  Timeout:    ${config.timeoutMs ? `${config.timeoutMs} ms` : 'none'}`));
      console.log(chalk.dim(`  Shell:      ${config.shell}`));
      console.log(chalk.dim(`  Verbose:    ${config.verbose}`));
      console.log(chalk.dim(`  Precedence: ${config.errorPrecedence}`));
      console.log('');
      return;
    }

    if (options.timeout) {
      const timeoutMs = parseInt(options.timeout, 10);
      if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
        console.error(formatError(`Invalid timeout: ${options.timeout}`));
        process.exitCode = 1;
        return;
      }
      setConfig('timeoutMs', timeoutMs);
    }
    if (options.precedence) {
      const precedence = parseErrorPrecedence(options.precedence);
      if (!precedence) {
        console.error(formatError(`Invalid precedence: ${options.precedence} (use task or deadline)`));
        process.exitCode = 1;
        return;
      }
      setConfig('errorPrecedence', precedence);
    }
    if (options.shell) setConfig('shell', options.shell);
    if (options.verbose) setConfig('verbose', options.verbose === 'true');
    console.log(chalk.green('Configuration updated.'));
  });

// Reset command
program
  .command('reset')
  .description('Reset all configuration to defaults')
  .action(() => {
    clearConfig();
    console.log(chalk.green('Configuration reset to defaults.'));
  });

function isSuccess(result: CommandResult): boolean {
  return result.exitCode === 0;
}

function formatResult(result: CommandResult): string {
  const label = `${formatCode(result.command)} ${formatDuration(result.duration)}`;
  if (result.cancelled) {
    return formatCancelled(`${label} cancelled`);
  }
  if (isSuccess(result)) {
    return formatSuccess(label);
  }
  return formatError(`${label} exit code ${result.exitCode ?? 'none'}`);
}

function indent(text: string): string {
  return text
    .trimEnd()
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

// Parse and run
await program.parseAsync();
