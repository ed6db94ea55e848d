#!/usr/bin/env node
/**
 * mediasift CLI - separate media from everything else
 *
 * Usage:
 *   mediasift --source DIR [--backup DIR] [--mode preserve|flatten-by-scope]
 *             [--dry-run] [--yes] [--config FILE] [--log-dir DIR] [--max-passes N]
 */

import { config as loadEnv } from 'dotenv';
import path from 'path';
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';
import { ConfigManager, configFromEnv, isPlanMode, type AppConfig } from './config.js';
import { AppError, handleError, logger } from './logger.js';
import { formatBytes, createProgressListener } from './progress.js';
import { RunCoordinator } from './run-coordinator.js';
import { RunLogWriter } from './run-log-writer.js';
import type { ConfirmationDecision, RunSummary } from './types.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliArgs {
  command: 'run' | 'help';
  configPath: string;
  overrides: Partial<AppConfig>;
  yes: boolean;
  showConfig: boolean;
  verbose: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: 'run',
    configPath: './mediasift.yaml',
    overrides: {},
    yes: false,
    showConfig: false,
    verbose: false,
  };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('--')) {
      throw new AppError(`Missing value for ${flag}`, 'INVALID_CONFIG');
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'help' || arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else if (arg === '--source' || arg === '-s') {
      result.overrides.sourceRoot = valueOf(arg, ++i);
    } else if (arg === '--backup' || arg === '-b') {
      result.overrides.backupRoot = valueOf(arg, ++i);
    } else if (arg === '--mode') {
      const mode = valueOf(arg, ++i);
      if (!isPlanMode(mode)) {
        throw new AppError(`Invalid --mode value: ${mode}`, 'INVALID_CONFIG');
      }
      result.overrides.mode = mode;
    } else if (arg === '--flatten') {
      result.overrides.mode = 'flatten-by-scope';
    } else if (arg === '--dry-run') {
      result.overrides.dryRun = true;
    } else if (arg === '--yes' || arg === '-y') {
      result.yes = true;
    } else if (arg === '--config' || arg === '-c') {
      result.configPath = valueOf(arg, ++i);
    } else if (arg === '--log-dir') {
      result.overrides.logDir = valueOf(arg, ++i);
    } else if (arg === '--max-passes') {
      const raw = valueOf(arg, ++i);
      const passes = Number.parseInt(raw, 10);
      if (!Number.isInteger(passes) || passes < 1) {
        throw new AppError(`Invalid --max-passes value: ${raw}`, 'INVALID_CONFIG');
      }
      result.overrides.maxArchivePasses = passes;
    } else if (arg === '--show-config') {
      result.showConfig = true;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else {
      throw new AppError(`Unknown argument: ${arg}`, 'INVALID_CONFIG');
    }
  }

  return result;
}

export function loadConfiguration(args: CliArgs, env: NodeJS.ProcessEnv = process.env): ConfigManager {
  const envIssues: string[] = [];
  const fromEnv = configFromEnv(env, envIssues);
  return new ConfigManager(args.configPath)
    .addIssues(envIssues)
    .apply(fromEnv)
    .apply(args.overrides);
}

// ============================================================================
// Output
// ============================================================================

export function describeOperations(summary: RunSummary): string[] {
  return summary.operations.flatMap(operation => {
    switch (operation.kind) {
      case 'move':
        return [`Would move: ${operation.sourcePath} -> ${operation.destinationPath ?? ''}`];
      case 'extract':
        return [`Would extract: ${operation.sourcePath}`];
      case 'error':
        return [`Error: ${operation.sourcePath}: ${operation.error ?? 'unknown error'}`];
      default:
        return [];
    }
  });
}

export function formatCounts(summary: RunSummary): string {
  const { counts } = summary;
  return [
    `scanned ${counts.scanned}`,
    `moved ${counts.moved}`,
    `skipped ${counts.skipped}`,
    `errored ${counts.errored}`,
    `archives ${counts.extracted}`,
    `relocated ${formatBytes(summary.bytesRelocated)}`,
  ].join(', ');
}

/**
 * 2 for bad flags or configuration, 1 for every other failure
 */
export function exitCodeFor(error: AppError): number {
  return error.code === 'INVALID_CONFIG' ? 2 : 1;
}

function printHelp(): void {
  console.log(`
mediasift - move everything that is not a photo, video or song out of the way

Usage:
  mediasift --source DIR [options]

Options:
  -s, --source DIR        Directory to sort (or MEDIASIFT_SOURCE)
  -b, --backup DIR        Where non-media goes (default: DIR/NonMedia)
      --mode MODE         preserve (default) or flatten-by-scope
      --flatten           Same as --mode flatten-by-scope
      --dry-run           Show the plan and stop
  -y, --yes               Do not ask for confirmation
  -c, --config FILE       YAML or JSON config (default: ./mediasift.yaml)
      --log-dir DIR       Where operation logs go (default: backup directory)
      --max-passes N      Archive extraction pass limit (default: 10)
      --show-config       Print the effective configuration and exit
  -v, --verbose           Debug logging
`);
}

async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.on('SIGINT', () => {
      rl.close();
      resolve(false);
    });
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase().startsWith('y'));
    });
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(argv: string[]): Promise<number> {
  loadEnv({ override: false });

  const args = parseArgs(argv);
  if (args.command === 'help') {
    printHelp();
    return 0;
  }

  const manager = loadConfiguration(args);
  const appConfig = manager.getAll();
  logger.setMinLevel(args.verbose ? 'debug' : appConfig.logLevel);

  if (args.showConfig) {
    console.log(manager.toYAML());
    return 0;
  }

  const config = manager.toSorterConfig();
  const logDir = appConfig.logDir ? path.resolve(appConfig.logDir) : config.backupRoot;
  // A preview writes nothing unless a log directory was asked for
  const sink = config.dryRun && !appConfig.logDir ? undefined : new RunLogWriter(logDir);

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) return;
    logger.warn('Interrupt received; stopping after the current file');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const coordinator = new RunCoordinator({
    config,
    sink,
    signal: controller.signal,
    onProgress: createProgressListener(),
    confirm: async (preview): Promise<ConfirmationDecision> => {
      for (const line of describeOperations(preview)) {
        console.log(line);
      }
      console.log(`\nPlan: ${formatCounts(preview)}`);
      if (args.yes) return 'proceed';
      return (await confirm(`Process ${preview.counts.moved} file(s)?`)) ? 'proceed' : 'abort';
    },
  });

  try {
    console.log(`🔎 Sorting ${config.sourceRoot} (${config.mode})`);
    const outcome = await coordinator.run();

    if (config.dryRun) {
      console.log('\nDry run results:');
      for (const line of describeOperations(outcome.preview)) {
        console.log(line);
      }
      console.log(`\nPlan: ${formatCounts(outcome.preview)}`);
      return 0;
    }

    if (outcome.state === 'declined') {
      console.log('Nothing was changed.');
      return 0;
    }

    if (outcome.state === 'interrupted') {
      console.log(`\nInterrupted: ${outcome.summary ? formatCounts(outcome.summary) : 'no operations'}`);
      return 1;
    }

    if (outcome.summary) {
      logger.success(`Done: ${formatCounts(outcome.summary)}`);
    }
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? path.resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      process.exitCode = exitCodeFor(handleError(error, 'mediasift'));
    });
}
