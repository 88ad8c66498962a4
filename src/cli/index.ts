#!/usr/bin/env node

/**
 * surface-inventory CLI
 *
 * Run progress goes through the pino logger. The final summary tables are
 * user-facing terminal output and use console with chalk and cli-table3.
 */

import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';

import { AwsClientProvider } from '../clients/aws-client-provider.class.js';
import { loadConfig, type InventoryConfigOverrides } from '../config/inventory-config.js';
import { getGlobalLogger, isLogLevel, type Logger } from '../concerns/logger.js';
import { BaseError } from '../errors.js';
import { ResourceIndexer, writeIndex, type InventoryIndex } from '../indexer/resource-indexer.class.js';
import { SmithyModelLoader } from '../model/smithy-model-loader.class.js';
import { InventoryRunner } from '../orchestrator/inventory-runner.class.js';
import { FileSystemResultStorage } from '../storage/filesystem-result-storage.class.js';
import { resolveRunDir } from '../storage/run-dir.js';
import type { RunSummary } from '../types/run.types.js';

interface CollectOptions {
  outputDir?: string;
  regions?: string[];
  concurrency?: number;
  maxPages?: number;
  maxFollowups?: number;
  allow?: string[];
  deny?: string[];
  modelsDir?: string;
  envFile?: string;
  logLevel?: string;
  index: boolean;
}

interface IndexOptions {
  logLevel?: string;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

function cliLogger(level: string | undefined): Logger {
  return getGlobalLogger(isLogLevel(level) ? { level } : {});
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(message));
  if (error instanceof BaseError && error.suggestion) {
    console.error(chalk.yellow(error.suggestion));
  }
  process.exit(1);
}

function printRunSummary(summary: RunSummary, runDir: string): void {
  const table = new Table({ head: ['executed', 'successful', 'failed', 'unavailable', 'skipped', 'errors', 'elapsed'] });
  table.push([
    summary.executed,
    summary.successful,
    summary.failed,
    summary.unavailable,
    summary.skipped,
    summary.errors.length,
    `${(summary.elapsedMs / 1000).toFixed(1)}s`,
  ]);
  console.log(table.toString());

  if (summary.stopped) {
    console.log(chalk.yellow('Run interrupted: remaining tasks were not scheduled.'));
  }
  for (const error of summary.errors) {
    console.log(chalk.red(`  ${error.namespace}/${error.region}: ${error.error}`));
  }
  console.log(chalk.green(`✓ Results written to ${runDir}`));
}

function printIndex(index: InventoryIndex): void {
  const table = new Table({ head: ['namespace', 'regions', 'successful', 'failed', 'unavailable', 'resources'] });
  for (const namespace of Object.keys(index.namespaces).sort()) {
    const regions = Object.values(index.namespaces[namespace]?.regions ?? {});
    table.push([
      namespace,
      regions.length,
      regions.reduce((sum, entry) => sum + entry.successful, 0),
      regions.reduce((sum, entry) => sum + entry.failed, 0),
      regions.reduce((sum, entry) => sum + entry.unavailable, 0),
      regions.reduce((sum, entry) => sum + entry.resources, 0),
    ]);
  }
  console.log(table.toString());
  console.log(chalk.blue(`${index.totalResources} resources across ${index.regions.length} regions`));
}

async function indexRun(runDir: string, logger: Logger): Promise<InventoryIndex> {
  const storage = new FileSystemResultStorage({ runDir, logger });
  const index = await new ResourceIndexer({ logger }).build(storage);
  await writeIndex(runDir, index);
  return index;
}

const program = new Command();

program
  .name('surface-inventory')
  .description('Discover the read-only operations of a cloud account, run them and count what they return');

program
  .command('collect')
  .description('Run every safe read operation for the selected namespaces and regions')
  .option('-o, --output-dir <dir>', 'Base directory for run folders')
  .option('-r, --regions <list>', 'Comma-separated regions, or "all"', parseList)
  .option('-c, --concurrency <n>', 'Tasks in flight at once', parseInteger)
  .option('--max-pages <n>', 'Pages read per paginated operation', parseInteger)
  .option('--max-followups <n>', 'Follow-up calls per inferred parameter', parseInteger)
  .option('--allow <list>', 'Only these namespaces', parseList)
  .option('--deny <list>', 'Skip these namespaces', parseList)
  .option('--models-dir <dir>', 'Directory of service model files')
  .option('--env-file <path>', 'Environment file read before the process environment')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .option('--no-index', 'Do not index the run after collecting')
  .action(async (options: CollectOptions) => {
    const logger = cliLogger(options.logLevel);
    try {
      const overrides: InventoryConfigOverrides = {
        outputDir: options.outputDir,
        regions: options.regions,
        concurrency: options.concurrency,
        maxPages: options.maxPages,
        maxFollowups: options.maxFollowups,
        allow: options.allow,
        deny: options.deny,
        modelsDir: options.modelsDir,
      };
      const config = loadConfig(overrides, { dotenv: options.envFile ?? true });

      const clientProvider = new AwsClientProvider({ ...config, logger });
      const identity = await clientProvider.identify();
      const runDir = resolveRunDir(config.outputDir, identity);

      const storage = new FileSystemResultStorage({ runDir, logger });
      const runner = new InventoryRunner({
        config,
        loader: new SmithyModelLoader(path.resolve(config.modelsDir)),
        clientProvider,
        storage,
        logger,
        identity,
        runId: path.basename(runDir),
      });

      process.once('SIGINT', () => runner.stop());
      const summary = await runner.run();
      printRunSummary(summary, runDir);

      if (options.index) {
        printIndex(await indexRun(runDir, logger));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('index <runDir>')
  .description('Count resources in a finished run and write index.json')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .action(async (runDir: string, options: IndexOptions) => {
    const logger = cliLogger(options.logLevel);
    try {
      printIndex(await indexRun(path.resolve(runDir), logger));
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
