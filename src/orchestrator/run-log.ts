/**
 * Run Log
 *
 * Progress and failure messages for a run. Lines go to stderr (stdout is
 * kept for command output) and, when a log file is configured, are appended
 * to it with a timestamp and level.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'info' | 'warn' | 'error';

export interface RunLog {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunLogOptions {
  /** Append every line to this file as well. */
  logFile?: string;
  /** Replaces stderr output. */
  write?: (line: string) => void;
  now?: () => Date;
}

const PREFIX = '[fleet-metrics]';

export function createRunLog(options: RunLogOptions = {}): RunLog {
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string): void => {
    write(level === 'info' ? `${PREFIX} ${message}` : `${PREFIX} ${level}: ${message}`);
    if (options.logFile) {
      appendFileSync(
        options.logFile,
        `${now().toISOString()} ${level.toUpperCase()} ${message}\n`,
        'utf-8'
      );
    }
  };

  return {
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

/**
 * Log that keeps lines in memory. Used by tests and by callers that want
 * to inspect what a run reported.
 */
export function createMemoryRunLog(): RunLog & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}
