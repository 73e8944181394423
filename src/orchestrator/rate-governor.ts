/**
 * Rate Governor
 *
 * Checked after every API response. When the remaining quota reported by
 * that response is below the low-water mark, the caller waits a fixed
 * cool-down before issuing its next request. No shared counters: each
 * observe() call decides from its own quota signal.
 */

import type { RunLog } from './run-log.js';

export const DEFAULT_LOW_WATER_MARK = 100;
export const DEFAULT_COOLDOWN_MS = 5_000;

export interface RateGovernorOptions {
  lowWaterMark?: number;
  cooldownMs?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: RunLog;
}

export class RateGovernor {
  readonly lowWaterMark: number;
  readonly cooldownMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log?: RunLog;

  constructor(options: RateGovernorOptions = {}) {
    this.lowWaterMark = options.lowWaterMark ?? DEFAULT_LOW_WATER_MARK;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log;
  }

  /**
   * Resolves once it is safe to send the next request.
   * A null signal (header missing) never pauses.
   */
  async observe(remaining: number | null): Promise<void> {
    if (remaining === null || remaining >= this.lowWaterMark) return;
    this.log?.warn(
      `Rate limit low (${remaining} requests left), pausing ${this.cooldownMs}ms`
    );
    await this.sleep(this.cooldownMs);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
