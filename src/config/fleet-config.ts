/**
 * Fleet Configuration Manager
 *
 * Reads and writes config.json (or the file passed with --config).
 * Validates with Zod on read; serializes on write.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { FleetConfig, FleetSettings, WindowConfig } from './types.js';
import { homeFile, prepareHomeFile } from './paths.js';
import { GITHUB_API } from '../clients/github-client.js';
import { fixedWindow, monthsBackWindow, type TimeWindow } from '../orchestrator/time-range.js';
import type { MetricSettings } from '../metrics/shared.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_SETTINGS: FleetSettings = {
  repoConcurrency: 5,
  detailConcurrency: 10,
  rateLimitThreshold: 100,
  rateLimitCooldownMs: 5000,
  integrationLabel: 'bug-integration',
  rollbackKeyword: 'rollback',
  requestTimeoutMs: 30_000,
  apiBaseUrl: GITHUB_API,
  logToFile: false,
};

// ─── Zod Schemas ─────────────────────────────────────────────

const positiveInt = z.number().int().positive();

const SettingsSchema = z.object({
  repoConcurrency: positiveInt.default(DEFAULT_SETTINGS.repoConcurrency),
  detailConcurrency: positiveInt.default(DEFAULT_SETTINGS.detailConcurrency),
  rateLimitThreshold: z.number().int().nonnegative().default(DEFAULT_SETTINGS.rateLimitThreshold),
  rateLimitCooldownMs: z.number().int().nonnegative().default(DEFAULT_SETTINGS.rateLimitCooldownMs),
  integrationLabel: z.string().min(1).default(DEFAULT_SETTINGS.integrationLabel),
  rollbackKeyword: z.string().min(1).default(DEFAULT_SETTINGS.rollbackKeyword),
  requestTimeoutMs: positiveInt.default(DEFAULT_SETTINGS.requestTimeoutMs),
  apiBaseUrl: z.string().url().default(DEFAULT_SETTINGS.apiBaseUrl),
  logToFile: z.boolean().default(DEFAULT_SETTINGS.logToFile),
});

const WindowSchema = z.union([
  z.object({ monthsBack: positiveInt }).strict(),
  z
    .object({ start: z.string(), end: z.string() })
    .strict()
    .refine(
      ({ start, end }) => {
        const s = Date.parse(start);
        const e = Date.parse(end);
        return !isNaN(s) && !isNaN(e) && s < e;
      },
      { message: 'window.start must be a date before window.end' }
    ),
]);

const FleetConfigSchema = z.object({
  version: z.literal(1),
  owner: z.string().min(1),
  defaultBranch: z.string().min(1).optional(),
  workflow: z.union([z.string().min(1), positiveInt]),
  window: WindowSchema.default({ monthsBack: 1 }),
  areas: z.record(z.string(), z.array(z.string().min(1))),
  settings: SettingsSchema.default({}),
});

export { FleetConfigSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate the fleet config.
 * Throws ConfigError when the file is missing, is not JSON, or fails validation.
 */
export function readFleetConfig(filePath = homeFile('config')): FleetConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(`No config found at ${filePath}. Run "fleet-metrics init" to create one.`);
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${reason}`);
  }

  const result = FleetConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Write the fleet config. Validates before writing to prevent corrupt configs.
 * Without an explicit path, the config directory is created if needed.
 */
export function writeFleetConfig(config: FleetConfig, filePath?: string): string {
  FleetConfigSchema.parse(config);
  let target: string;
  if (filePath) {
    mkdirSync(dirname(filePath), { recursive: true });
    target = filePath;
  } else {
    target = prepareHomeFile('config');
  }
  writeFileSync(target, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return target;
}

export function fleetConfigExists(filePath = homeFile('config')): boolean {
  return existsSync(filePath);
}

/**
 * Create a config scaffold for `fleet-metrics init`.
 */
export function createDefaultConfig(owner: string, areas: Record<string, string[]> = {}): FleetConfig {
  return {
    version: 1,
    owner,
    workflow: 'Deploy',
    window: { monthsBack: 1 },
    areas,
    settings: { ...DEFAULT_SETTINGS },
  };
}

// ─── Derived values ──────────────────────────────────────────

export function resolveWindow(window: WindowConfig, now = new Date()): TimeWindow {
  return 'monthsBack' in window
    ? monthsBackWindow(window.monthsBack, now)
    : fixedWindow(window.start, window.end);
}

export function metricSettings(settings: FleetSettings): MetricSettings {
  return {
    detailConcurrency: settings.detailConcurrency,
    integrationLabel: settings.integrationLabel,
    rollbackKeyword: settings.rollbackKeyword,
  };
}

/** Total number of distinct repositories across areas. */
export function countRepositories(config: FleetConfig): number {
  return Object.values(config.areas).reduce((sum, repos) => sum + new Set(repos).size, 0);
}
