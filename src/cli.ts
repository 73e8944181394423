#!/usr/bin/env node

/**
 * fleet-metrics CLI
 *
 * Collect engineering metrics for every repository of an organization.
 *
 * Usage:
 *   fleet-metrics run [--config path] [--out dir] [--format markdown|json|both]
 *   fleet-metrics init [--owner org] [--token token] [--force]
 *   fleet-metrics history [--limit 10]
 *   fleet-metrics status
 */

import { readFleetConfig, fleetConfigExists, countRepositories, resolveWindow } from './config/fleet-config.js';
import { hasGitHubCredentials } from './config/credentials.js';
import { fleetHome, configFilePath } from './config/paths.js';
import { runMetrics, parseRunOptions } from './commands/run.js';
import { runInit, formatInitResult } from './commands/init.js';
import { runHistory } from './commands/history.js';

const VERSION = '1.0.0';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  if (args[0] === '--help') {
    return { command: 'help', flags: {} };
  }
  let command = args[0] && !args[0].startsWith('--') ? args[0] : 'run';
  let flagStart = command === args[0] ? 1 : 0;

  // "help run" → "help-run"
  const topic = args[1];
  if (command === 'help' && topic && !topic.startsWith('--')) {
    command = `help-${topic}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};
  const rest = args.slice(flagStart);
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg?.startsWith('--')) continue;
    const key = arg.slice(2);
    const next = rest[i + 1];
    // Boolean flags (e.g., --force) vs value flags (e.g., --out reports)
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = '';
    }
  }

  return { command, flags };
}

// ─── Commands ───────────────────────────────────────────────

async function runRun(flags: Record<string, string>): Promise<string> {
  const { result, files } = await runMetrics(parseRunOptions(flags));
  const failed = result.records.filter((r) => r.status === 'failed').length;
  const partial = result.records.filter((r) => r.status === 'partial').length;
  return [
    `Collected metrics for ${result.records.length} repositories (${partial} partial, ${failed} failed)`,
    ...files.map((f) => `  ${f}`),
  ].join('\n');
}

function runStatus(flags: Record<string, string>): string {
  const configPath = configFilePath(flags['config'] || undefined);
  const config = fleetConfigExists(configPath) ? readFleetConfig(configPath) : null;

  const lines: string[] = [];
  lines.push(`fleet-metrics v${VERSION}`);
  lines.push('');
  lines.push(`Home:        ${fleetHome()}`);
  lines.push(`Config:      ${config ? configPath : 'Not configured (run "fleet-metrics init")'}`);
  lines.push(
    `GitHub:      ${hasGitHubCredentials() ? 'Configured' : 'Not configured (set GITHUB_TOKEN or run "fleet-metrics init --token ...")'}`
  );

  if (config) {
    const window = resolveWindow(config.window);
    lines.push('');
    lines.push(`Owner:       ${config.owner}`);
    lines.push(`Workflow:    ${config.workflow}`);
    lines.push(`Window:      ${window.from} to ${window.to}`);
    lines.push(`Repos:       ${countRepositories(config)} in ${Object.keys(config.areas).length} areas`);
    for (const area of Object.keys(config.areas).sort()) {
      lines.push(`  - ${area}: ${(config.areas[area] ?? []).join(', ') || 'none'}`);
    }
  }

  return lines.join('\n');
}

function showHelp(topic?: string): string {
  const help = topic ? COMMAND_HELP[topic] : undefined;
  if (help) {
    return help;
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `fleet-metrics - Engineering metrics across a fleet of GitHub repositories

Usage:
  fleet-metrics <command> [options]
  fleet-metrics help <command>

Commands:
  run               Collect metrics for every configured repository (default)
  init              Write a config scaffold, optionally storing a GitHub token
  history           List recent runs
  status            Show config, credentials and configured repositories
  help [command]    Show help for a specific command

Examples:
  fleet-metrics init --owner acme        Create ~/.fleet-metrics/config.json
  fleet-metrics run --out reports        Write reports/output.md and reports/metrics.json
  fleet-metrics run --format json        JSON report only
  fleet-metrics history --limit 5        Last five runs

Environment Variables:
  GITHUB_TOKEN         GitHub token (overrides the credentials file)
  FLEET_METRICS_HOME   Config directory (default: ~/.fleet-metrics)`;

const COMMAND_HELP: Record<string, string> = {
  run: `fleet-metrics run - Collect metrics

  Reads the config, walks every repository of every area (5 at a time by
  default), and writes the reports. A repository that cannot be read is
  reported as failed; the run continues with the others.

Options:
  --config <path>     Config file (default: ~/.fleet-metrics/config.json)
  --out <dir>         Directory for output.md and metrics.json (default: .)
  --format <format>   markdown, json or both (default: both)
  --log-file <path>   Also append log lines to this file
  --no-history        Do not record the run in history.db`,

  init: `fleet-metrics init - Write a config scaffold

Options:
  --owner <org>       GitHub organization or user (default: my-org)
  --config <path>     Where to write the config (default: ~/.fleet-metrics/config.json)
  --token <token>     Save a GitHub token to credentials.json (mode 600)
  --force             Overwrite an existing config`,

  history: `fleet-metrics history - List recent runs

Options:
  --limit <n>         Number of runs to show (default: 10)`,

  status: `fleet-metrics status - Show setup

Options:
  --config <path>     Config file to inspect`,
};

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'run':
        output = await runRun(flags);
        break;
      case 'init':
        output = formatInitResult(runInit(flags));
        break;
      case 'history':
        output = runHistory(flags);
        break;
      case 'status':
        output = runStatus(flags);
        break;
      case 'help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
        process.exitCode = 1;
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
