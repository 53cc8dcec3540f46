import Conf from 'conf';
import { config as dotenvConfig } from 'dotenv';
import path from 'path';
import fs from 'fs';
import type { ErrorPrecedence } from './group/index.js';

// Load .env files in order of precedence (later files override earlier)
// 1. .env in home directory (~/.conjoin/.env)
// 2. .env in current working directory
const homeEnvPath = path.join(process.env.HOME || '', '.conjoin', '.env');
const cwdEnvPath = path.join(process.cwd(), '.env');

if (fs.existsSync(homeEnvPath)) {
  dotenvConfig({ path: homeEnvPath });
}
if (fs.existsSync(cwdEnvPath)) {
  dotenvConfig({ path: cwdEnvPath, override: true });
}

export interface ConfigSchema {
  timeoutMs: number; // 0 = wait without a deadline
  shell: string;
  verbose: boolean;
  errorPrecedence: ErrorPrecedence;
}

const config = new Conf<ConfigSchema>({
  projectName: 'conjoin',
  defaults: {
    timeoutMs: 0,
    shell: 'sh',
    verbose: false,
    errorPrecedence: 'task',
  },
});

export function parseErrorPrecedence(value: string | undefined): ErrorPrecedence | undefined {
  return value === 'task' || value === 'deadline' ? value : undefined;
}

/**
 * Get configuration with priority:
 * 1. Environment variables (from .env or shell)
 * 2. Stored config (from conf)
 * 3. Defaults
 */
export const getConfig = (): ConfigSchema => {
  const envTimeout = parseInt(process.env.CONJOIN_TIMEOUT_MS || '', 10);

  return {
    timeoutMs: Number.isNaN(envTimeout) ? config.get('timeoutMs') : envTimeout,
    shell: process.env.CONJOIN_SHELL || config.get('shell'),
    verbose: process.env.CONJOIN_VERBOSE === 'true' || config.get('verbose'),
    errorPrecedence:
      parseErrorPrecedence(process.env.CONJOIN_ERROR_PRECEDENCE) || config.get('errorPrecedence'),
  };
};

export const setConfig = <K extends keyof ConfigSchema>(key: K, value: ConfigSchema[K]) => {
  config.set(key, value);
};

export const clearConfig = () => {
  config.clear();
};
