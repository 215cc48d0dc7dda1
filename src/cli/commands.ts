/**
 * CLI Commands Module
 *
 * Commands:
 * - build: Split files over the size limit, record them, update the ignore list
 * - all (merge): Rebuild every tracked original from its chunks
 * - clean: Remove all chunk files and the tracker store
 * - rebuild: clean, then build
 * - status: Show tracked files and chunk presence
 * - verify: Report missing chunk files (exit code 1 if any)
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import * as fs from 'node:fs';
import * as path from 'node:path';

import {
  SplitManager,
  type BuildResult,
  type FileFailure,
  type MergeAllResult,
  type ProgressCallback,
  type ProgressPhase,
} from '../engines/splitManager.js';
import type { CleanResult } from '../engines/cleaner.js';
import { loadConfig, resolveSettings } from '../storage/config.js';
import { formatSize } from '../utils/size.js';
import { isSplitKeeperError } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

interface CommandOptions {
  sizeLimit?: string;
  splitInfo?: string;
  ignoreFile?: string;
  chunkDir?: string;
  headroom?: string;
  root?: string;
  concurrency?: number;
  json?: boolean;
  verbose?: boolean;
}

// ============================================================================
// Output Formatters
// ============================================================================

function printHeader(text: string): void {
  console.log('');
  console.log(chalk.cyan.bold(text));
  console.log(chalk.cyan('='.repeat(text.length)));
  console.log('');
}

function printSuccess(text: string): void {
  console.log(chalk.green('  ' + text));
}

function printError(text: string): void {
  console.log(chalk.red('  Error: ' + text));
}

function printWarning(text: string): void {
  console.log(chalk.yellow('  Warning: ' + text));
}

function printInfo(label: string, value: string | number): void {
  console.log(chalk.gray(`  ${label}: `) + chalk.white(String(value)));
}

function printFailures(failed: readonly FileFailure[]): void {
  if (failed.length === 0) return;
  console.log('');
  printWarning(`${failed.length} file(s) failed:`);
  for (const failure of failed) {
    console.log(chalk.yellow(`    - ${failure.path}: ${failure.error.userMessage}`));
  }
}

function failuresToJson(failed: readonly FileFailure[]): Array<Record<string, string>> {
  return failed.map((failure) => ({
    path: failure.path,
    code: failure.error.code,
    error: failure.error.userMessage,
  }));
}

function buildResultToJson(result: BuildResult): Record<string, unknown> {
  return {
    success: true,
    candidates: result.candidates,
    split: result.split.map((record) => ({
      path: record.originalPath,
      size: record.originalSize,
      chunks: record.chunkPaths,
    })),
    skipped: result.skipped,
    resplit: result.resplit,
    ignoreAdded: result.ignore?.added ?? [],
    failed: failuresToJson(result.failed),
  };
}

function mergeResultToJson(result: MergeAllResult): Record<string, unknown> {
  return {
    success: true,
    total: result.total,
    entries: result.entries,
    failed: failuresToJson(result.failed),
  };
}

function cleanResultToJson(result: CleanResult): Record<string, unknown> {
  return {
    success: true,
    removedChunks: result.removedChunks,
    storeRemoved: result.storeRemoved,
  };
}

const PHASE_LABELS: Record<ProgressPhase, string> = {
  scanning: 'Scanning for large files',
  checking: 'Checking tracked files',
  splitting: 'Splitting',
  merging: 'Merging',
};

/**
 * Progress callback that drives an ora spinner
 */
function spinnerProgress(spinner: Ora): ProgressCallback {
  return (progress) => {
    const label = PHASE_LABELS[progress.phase];
    if (progress.total === 0) {
      spinner.text = `${label}...`;
      return;
    }
    const file = progress.currentFile ? ` ${chalk.gray(progress.currentFile)}` : '';
    spinner.text = `${label} (${progress.current}/${progress.total})${file}`;
  };
}

// ============================================================================
// Setup Helpers
// ============================================================================

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Hide library logs unless --verbose is passed
 */
function configureLogging(options: CommandOptions): void {
  getLogger().setSilentConsole(!options.verbose);
}

async function createManager(options: CommandOptions): Promise<SplitManager> {
  const root = path.resolve(options.root ?? process.cwd());
  const config = await loadConfig(root);
  const settings = resolveSettings(
    config,
    {
      sizeLimit: options.sizeLimit,
      splitInfo: options.splitInfo,
      ignoreFile: options.ignoreFile,
      chunkDir: options.chunkDir,
      headroom: options.headroom,
      concurrency: options.concurrency,
    },
    root
  );
  return new SplitManager(settings);
}

function printBuildSummary(result: BuildResult, sizeLimitBytes: number): void {
  console.log('');
  printInfo('Files over limit', `${result.candidates.length} (> ${formatSize(sizeLimitBytes)})`);
  printInfo('Split', result.split.length);
  printInfo('Already split', result.skipped.length);
  if (result.resplit.length > 0) {
    printInfo('Split again', result.resplit.length);
  }
  if (result.ignore) {
    printInfo('Ignore entries added', result.ignore.added.length);
    for (const rejected of result.ignore.rejected) {
      printWarning(rejected.error.userMessage);
    }
  }
  for (const record of result.split) {
    printSuccess(`${record.originalPath} (${formatSize(record.originalSize)}) -> ${record.chunkCount} chunks`);
  }
  printFailures(result.failed);
  console.log('');
}

// ============================================================================
// Command: build
// ============================================================================

async function buildCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  if (options.json) {
    try {
      const manager = await createManager(options);
      const result = await manager.build();
      console.log(JSON.stringify(buildResultToJson(result)));
    } catch (error) {
      handleError(error, true);
    }
    return;
  }

  printHeader('splitkeeper - Build');
  const spinner = ora('Scanning for large files...').start();

  try {
    const manager = await createManager(options);
    const result = await manager.build(spinnerProgress(spinner));
    spinner.succeed(`Build completed: ${result.split.length} file(s) split`);
    printBuildSummary(result, manager.getSettings().sizeLimitBytes);
  } catch (error) {
    spinner.fail('Build failed');
    handleError(error);
  }
}

// ============================================================================
// Command: all
// ============================================================================

async function mergeCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  if (options.json) {
    try {
      const manager = await createManager(options);
      const result = await manager.mergeAll();
      console.log(JSON.stringify(mergeResultToJson(result)));
    } catch (error) {
      handleError(error, true);
    }
    return;
  }

  printHeader('splitkeeper - Merge All');
  const spinner = ora('Loading split information...').start();

  try {
    const manager = await createManager(options);
    const result = await manager.mergeAll(spinnerProgress(spinner));

    if (result.total === 0) {
      spinner.info('No split file information found');
      console.log('');
      return;
    }

    spinner.succeed(`Processed ${result.total} tracked file(s)`);
    console.log('');
    for (const entry of result.entries) {
      switch (entry.status) {
        case 'merged':
          printSuccess(`Merged ${entry.originalPath}`);
          break;
        case 'already-present':
          printSuccess(`${entry.originalPath} already present, removed ${entry.removedChunks.length} chunk(s)`);
          break;
        case 'already-merged':
          console.log(chalk.gray(`  ${entry.originalPath} already merged`));
          break;
      }
    }
    printFailures(result.failed);
    console.log('');
  } catch (error) {
    spinner.fail('Merge failed');
    handleError(error);
  }
}

// ============================================================================
// Command: clean
// ============================================================================

function printCleanSummary(result: CleanResult): void {
  if (result.removedCount > 0) {
    printSuccess(`Removed ${result.removedCount} chunk file(s)`);
  } else {
    console.log(chalk.gray('  No split files to clean'));
  }
  if (result.storeRemoved) {
    printSuccess('Removed split information');
  }
}

async function cleanCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  try {
    const manager = await createManager(options);
    const result = await manager.clean();

    if (options.json) {
      console.log(JSON.stringify(cleanResultToJson(result)));
      return;
    }

    printHeader('splitkeeper - Clean');
    printCleanSummary(result);
    console.log('');
  } catch (error) {
    handleError(error, options.json);
  }
}

// ============================================================================
// Command: rebuild
// ============================================================================

async function rebuildCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  if (options.json) {
    try {
      const manager = await createManager(options);
      const result = await manager.rebuild();
      console.log(JSON.stringify({
        success: true,
        clean: cleanResultToJson(result.clean),
        build: buildResultToJson(result.build),
      }));
    } catch (error) {
      handleError(error, true);
    }
    return;
  }

  printHeader('splitkeeper - Rebuild');
  const spinner = ora('Cleaning previous split files...').start();

  try {
    const manager = await createManager(options);
    const clean = await manager.clean();
    spinner.succeed(`Cleaned ${clean.removedCount} chunk file(s)`);

    const buildSpinner = ora('Scanning for large files...').start();
    try {
      const result = await manager.build(spinnerProgress(buildSpinner));
      buildSpinner.succeed(`Build completed: ${result.split.length} file(s) split`);
      printBuildSummary(result, manager.getSettings().sizeLimitBytes);
    } catch (error) {
      buildSpinner.fail('Build failed');
      throw error;
    }
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Rebuild failed');
    }
    handleError(error);
  }
}

// ============================================================================
// Command: status
// ============================================================================

async function statusCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  try {
    const manager = await createManager(options);
    const result = await manager.status();

    if (options.json) {
      console.log(JSON.stringify({ success: true, ...result }));
      return;
    }

    printHeader('splitkeeper - Status');
    printInfo('Split info', result.storePath);
    if (result.storeSource === 'corrupt') {
      printWarning('Split information is corrupt and was ignored');
    }
    printInfo('Tracked files', result.records.length);
    console.log('');

    for (const record of result.records) {
      const complete = record.presentChunks === record.chunkCount;
      const chunks = `${record.presentChunks}/${record.chunkCount} chunks`;
      const original = record.originalExists ? 'original present' : 'original absent';
      const line = `  ${record.originalPath} (${formatSize(record.originalSize)}): ${chunks}, ${original}`;
      console.log(complete || record.originalExists ? chalk.white(line) : chalk.yellow(line));
    }
    console.log('');
  } catch (error) {
    handleError(error, options.json);
  }
}

// ============================================================================
// Command: verify
// ============================================================================

async function verifyCommand(options: CommandOptions): Promise<void> {
  configureLogging(options);

  let ok = false;
  try {
    const manager = await createManager(options);
    const result = await manager.verify();
    ok = result.ok;

    if (options.json) {
      console.log(JSON.stringify({ success: result.ok, checked: result.checked, missing: result.missing }));
    } else {
      printHeader('splitkeeper - Verify');
      printInfo('Records checked', result.checked);
      console.log('');
      if (result.ok) {
        printSuccess('All chunk files present');
      } else {
        for (const report of result.missing) {
          printError(`${report.originalPath} is missing ${report.missingChunks.length} chunk(s)`);
          for (const chunk of report.missingChunks) {
            console.log(chalk.red(`    - ${chunk}`));
          }
        }
      }
      console.log('');
    }
  } catch (error) {
    handleError(error, options.json);
  }

  if (!ok) {
    process.exit(1);
  }
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Print an error and exit with code 1
 */
function handleError(error: unknown, json = false): never {
  if (json) {
    const payload = isSplitKeeperError(error)
      ? { success: false, code: error.code, error: error.userMessage }
      : { success: false, error: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify(payload));
    process.exit(1);
  }

  console.log('');
  const debug = Boolean(process.env.DEBUG || process.env.SPLITKEEPER_DEBUG);

  if (isSplitKeeperError(error)) {
    printError(error.userMessage);
    if (debug) {
      console.log(chalk.gray('  Developer: ' + error.developerMessage));
    }
  } else if (error instanceof Error) {
    printError(error.message);
    if (debug) {
      console.log(chalk.gray('  Stack: ' + error.stack));
    }
  } else {
    printError(String(error));
  }

  console.log('');
  console.log(chalk.gray('  For more details, run with DEBUG=1 environment variable'));
  console.log('');

  process.exit(1);
}

// ============================================================================
// CLI Program
// ============================================================================

function withSharedOptions(command: Command): Command {
  return command
    .option('-s, --size-limit <size>', 'Split files larger than this, e.g. 100M or 1G (default: 100M)')
    .option('-i, --split-info <file>', 'Split information file (default: split_files_info.json)')
    .option('--ignore-file <file>', 'Ignore list that receives split originals (default: .gitignore)')
    .option('--chunk-dir <dir>', 'Directory for chunk files, relative to the root')
    .option('--headroom <size>', 'Space kept free below the size limit in each chunk (default: 1M)')
    .option('--root <dir>', 'Working root (default: current directory)')
    .option('-j, --concurrency <n>', 'Files processed in parallel (default: 4)', parseConcurrency)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Show detailed logging output');
}

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('splitkeeper')
    .description('Split oversized files into tracked chunks and merge them back on demand')
    .version(getVersion(), '-v, --version', 'Show version number');

  withSharedOptions(
    program.command('build').description('Split large files and update split information and the ignore list')
  ).action(buildCommand);

  withSharedOptions(
    program.command('all').alias('merge').description('Merge all split files back into their originals')
  ).action(mergeCommand);

  withSharedOptions(
    program.command('clean').description('Remove all chunk files and the split information')
  ).action(cleanCommand);

  withSharedOptions(
    program.command('rebuild').description('Clean, then build from scratch')
  ).action(rebuildCommand);

  withSharedOptions(
    program.command('status').description('Show tracked files and chunk presence')
  ).action(statusCommand);

  withSharedOptions(
    program.command('verify').description('Check that every chunk file is present')
  ).action(verifyCommand);

  return program;
}

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    getLogger().debug('CLI', 'Could not read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return '0.0.0';
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[]): Promise<void> {
  const program = createCLI();
  await program.parseAsync(args, { from: 'node' });
}

// ============================================================================
// Exports
// ============================================================================

export {
  buildCommand,
  mergeCommand,
  cleanCommand,
  rebuildCommand,
  statusCommand,
  verifyCommand,
  handleError,
};
