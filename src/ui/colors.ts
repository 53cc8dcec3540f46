/**
 * Terminal color theme
 * Muted pastels for task and group status output
 */

import chalk from 'chalk';

export const colors = {
  warmPeach: chalk.hex('#FFB5A7'),
  pastelRose: chalk.hex('#F8B4D9'),

  mintCream: chalk.hex('#D4F1E8'),
  butterYellow: chalk.hex('#FFF4C4'),
  skyBlush: chalk.hex('#FFE4E1'),

  warmGray: chalk.hex('#9B9B9B'),
} as const;

/**
 * Semantic color mappings
 */
export const theme = {
  // Status indicators
  success: colors.mintCream,
  warning: colors.butterYellow,
  error: colors.skyBlush,
  cancelled: colors.pastelRose,

  // Text hierarchy
  secondary: colors.warmGray,
  dim: colors.warmGray,
  emphasis: colors.warmPeach.bold,

  code: colors.mintCream,
} as const;

export function formatSuccess(message: string): string {
  return `${theme.success('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${theme.error('✗')} ${message}`;
}

export function formatWarning(message: string): string {
  return `${theme.warning('⚠')} ${message}`;
}

/**
 * Format a task that was stopped by cancellation
 */
export function formatCancelled(message: string): string {
  return `${theme.cancelled('⊘')} ${message}`;
}

export function formatHeader(text: string): string {
  return theme.emphasis(text);
}

export function formatCode(code: string): string {
  return theme.code(code);
}

/**
 * Format a duration in milliseconds as seconds
 */
export function formatDuration(ms: number): string {
  return theme.dim(`${(ms / 1000).toFixed(2)}s`);
}
