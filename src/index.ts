#!/usr/bin/env node
/**
 * splitkeeper - Entry Point
 *
 * Usage:
 *   splitkeeper build -s 100M          # Split files over 100 MiB
 *   splitkeeper all                    # Merge every tracked file back
 *   splitkeeper clean                  # Remove chunks and split information
 *   splitkeeper rebuild | status | verify
 *   splitkeeper help [command]
 */

function logCrash(error: unknown): void {
  const message = error instanceof Error ? `${error.message}\n${error.stack}` : String(error);
  process.stderr.write(`[${new Date().toISOString()}] [ERROR] [startup] splitkeeper crashed: ${message}\n`);
}

process.on('uncaughtException', (error) => {
  logCrash(error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logCrash(reason instanceof Error ? reason : new Error(String(reason)));
  process.exit(1);
});

async function main(): Promise<void> {
  const { runCLI } = await import('./cli/commands.js');
  await runCLI(process.argv);
}

main().catch((error: unknown) => {
  logCrash(error);
  process.exit(1);
});
