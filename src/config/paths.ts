/**
 * fleet-metrics home directory
 *
 * The config file, credentials, run history and log file live together in
 * one directory: FLEET_METRICS_HOME when set, else ~/.fleet-metrics. A
 * `--config` flag relocates the config file only. Reports go to `--out`
 * and are not resolved here.
 */

import { mkdirSync, chmodSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV = 'FLEET_METRICS_HOME';

const HOME_FILES = {
  config: 'config.json',
  credentials: 'credentials.json',
  history: 'history.db',
  log: 'fleet-metrics.log',
} as const;

export type HomeFile = keyof typeof HOME_FILES;

export function fleetHome(env: NodeJS.ProcessEnv = process.env): string {
  return env[HOME_ENV] || join(homedir(), '.fleet-metrics');
}

/** Path of one of the home directory's files. Touches nothing on disk. */
export function homeFile(file: HomeFile, env?: NodeJS.ProcessEnv): string {
  return join(fleetHome(env), HOME_FILES[file]);
}

/**
 * Path of a home file that is about to be written. Creates the home
 * directory first; it holds the token, so it is kept at mode 700.
 */
export function prepareHomeFile(file: HomeFile, env?: NodeJS.ProcessEnv): string {
  const dir = fleetHome(env);
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  chmodSync(dir, 0o700);
  return homeFile(file, env);
}

/** Config file a command works on: `--config` relative to `cwd`, else the home one. */
export function configFilePath(flag?: string, cwd = process.cwd()): string {
  return flag ? resolve(cwd, flag) : homeFile('config');
}
