/**
 * fleet-metrics init
 *
 * Writes a config scaffold and, optionally, stores a GitHub token in the
 * credentials file.
 */

import { fleetConfigExists, writeFleetConfig, createDefaultConfig } from '../config/fleet-config.js';
import { writeCredentials } from '../config/credentials.js';
import { configFilePath } from '../config/paths.js';

const EXAMPLE_AREAS: Record<string, string[]> = {
  Backend: ['api-service'],
  Frontend: ['web-app'],
};

export interface InitResult {
  configPath: string;
  created: boolean;
  savedToken: boolean;
}

export function runInit(flags: Record<string, string>): InitResult {
  const explicitPath = flags['config'] || undefined;
  const configPath = configFilePath(explicitPath);
  const owner = flags['owner'] || 'my-org';
  const force = 'force' in flags;

  let created = false;
  if (!fleetConfigExists(configPath) || force) {
    writeFleetConfig(createDefaultConfig(owner, EXAMPLE_AREAS), explicitPath ? configPath : undefined);
    created = true;
  }

  const token = flags['token'];
  if (token) {
    writeCredentials({ github: { token } });
  }

  return { configPath, created, savedToken: Boolean(token) };
}

export function formatInitResult(result: InitResult): string {
  const lines: string[] = [];
  if (result.created) {
    lines.push(`Wrote config scaffold to ${result.configPath}`);
    lines.push('Edit owner, workflow and areas, then run "fleet-metrics run".');
  } else {
    lines.push(`Config already exists at ${result.configPath} (use --force to overwrite)`);
  }
  if (result.savedToken) {
    lines.push('Saved GitHub token to the credentials file.');
  }
  return lines.join('\n');
}
