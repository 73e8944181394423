/**
 * Configuration Types
 *
 * Shape of the fleet config file and the credentials file. The Zod schemas
 * in fleet-config.ts and credentials.ts validate against these.
 */

/** Rolling window ending one month ago. */
export interface MonthsBackWindowConfig {
  monthsBack: number;
}

/** Explicit window; dates or ISO timestamps, end exclusive. */
export interface FixedWindowConfig {
  start: string;
  end: string;
}

export type WindowConfig = MonthsBackWindowConfig | FixedWindowConfig;

/** Tuning knobs. Every key has a default. */
export interface FleetSettings {
  repoConcurrency: number;
  detailConcurrency: number;
  rateLimitThreshold: number;
  rateLimitCooldownMs: number;
  integrationLabel: string;
  rollbackKeyword: string;
  requestTimeoutMs: number;
  apiBaseUrl: string;
  logToFile: boolean;
}

/** Root configuration, stored in ~/.fleet-metrics/config.json */
export interface FleetConfig {
  version: 1;
  owner: string;
  /** Branch measured for size; the repository default when unset. */
  defaultBranch?: string;
  /** Target workflow name, or its numeric ID. */
  workflow: string | number;
  window: WindowConfig;
  /** Area name to repository names. */
  areas: Record<string, string[]>;
  settings: FleetSettings;
}

/** GitHub credentials. */
export interface GitHubCredentials {
  token: string;
}

/** Root credentials, stored in ~/.fleet-metrics/credentials.json */
export interface CredentialsConfig {
  github?: GitHubCredentials;
}
