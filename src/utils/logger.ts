import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  critical(message: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  name?: string;
  /** Receives each formatted line. Defaults to stdout. */
  sink?: (line: string) => void;
  clock?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

const LABEL_COLOURS: Record<LogLevel, (text: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.blue,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
  CRITICAL: chalk.bgRed.white,
};

export function formatLogLine(level: LogLevel, name: string, message: string, timestamp: Date): string {
  return `${timestamp.toISOString()} - ${LABEL_COLOURS[level](level)} - ${name} - ${message}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const name = options.name ?? 'ssm-runtime-audit';
  const sink = options.sink ?? ((line: string) => console.log(line));
  const clock = options.clock ?? (() => new Date());
  const threshold = SEVERITY[options.level];

  const emit = (level: LogLevel, message: string): void => {
    if (SEVERITY[level] >= threshold) {
      sink(formatLogLine(level, name, message, clock()));
    }
  };

  return {
    debug: message => emit('DEBUG', message),
    info: message => emit('INFO', message),
    warn: message => emit('WARNING', message),
    error: message => emit('ERROR', message),
    critical: message => emit('CRITICAL', message),
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'CRITICAL', sink: () => undefined });
}
