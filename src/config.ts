import type { LogLevel } from './types/index.js';

export const DEFAULT_OLD_RUNTIMES = ['python3.9', 'python3.8', 'python3.7', 'python3.6', 'python2.7'];
export const DEFAULT_TARGET_RUNTIME = 'python3.10';
export const DEFAULT_INVENTORY_FILENAME = 'ssm_automations_to_update.txt';
export const DEFAULT_FILTERED_FILENAME = 'ssm_automations_filtered.txt';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];
export const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

/** Package the SSM commands cannot run without. */
export const SSM_SDK_PACKAGE = '@aws-sdk/client-ssm';

export const ExitCode = {
  Success: 0,
  Failure: 1,
  MissingDependency: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Splits a comma-separated runtime list, trimming entries and dropping blanks.
 */
export function parseRuntimeList(value: string): string[] {
  return value
    .split(',')
    .map(runtime => runtime.trim())
    .filter(runtime => runtime.length > 0);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
