/**
 * Credentials Resolver
 *
 * Resolves the GitHub token in order:
 * 1. GITHUB_TOKEN environment variable
 * 2. ~/.fleet-metrics/credentials.json
 *
 * Credentials file is stored with 600 permissions (owner read/write only).
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsConfig, GitHubCredentials } from './types.js';
import { homeFile, prepareHomeFile } from './paths.js';
import { ConfigError } from './fleet-config.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  github: z
    .object({
      token: z.string().min(1),
    })
    .optional(),
});

const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve GitHub credentials.
 * Checks env var first, then credentials file.
 */
export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envToken = process.env[ENV_GITHUB_TOKEN];
  if (envToken) {
    return { token: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.github?.token) {
    return fileConfig.github;
  }

  return null;
}

/** Like resolveGitHubCredentials, but a missing token is a ConfigError. */
export function requireGitHubCredentials(): GitHubCredentials {
  const credentials = resolveGitHubCredentials();
  if (!credentials) {
    throw new ConfigError(
      `No GitHub token found. Set ${ENV_GITHUB_TOKEN} or add one to ${homeFile('credentials')}`
    );
  }
  return credentials;
}

export function hasGitHubCredentials(): boolean {
  return resolveGitHubCredentials() !== null;
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from credentials.json.
 * Returns null if the file doesn't exist or doesn't validate.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = homeFile('credentials');
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Write credentials to credentials.json with 600 permissions.
 */
export function writeCredentials(config: CredentialsConfig): void {
  const filePath = prepareHomeFile('credentials');
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}
