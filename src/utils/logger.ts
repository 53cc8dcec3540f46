/**
 * Prefixed console loggers
 * Debug, info and warning output only appears when verbose is enabled.
 */

import { formatError, formatWarning, theme } from '../ui/colors.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(prefix: string, verbose: boolean = false): Logger {
  const tag = theme.dim(`[${prefix}]`);

  return {
    debug(message) {
      if (verbose) {
        console.log(`${tag} ${theme.secondary(message)}`);
      }
    },
    info(message) {
      if (verbose) {
        console.log(`${tag} ${message}`);
      }
    },
    warn(message) {
      if (verbose) {
        console.warn(`${tag} ${formatWarning(message)}`);
      }
    },
    error(message, error) {
      const detail = error === undefined ? '' : `: ${describeError(error)}`;
      console.error(`${tag} ${formatError(message + detail)}`);
    },
  };
}
