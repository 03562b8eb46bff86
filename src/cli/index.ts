#!/usr/bin/env node
/**
 * colonysim CLI - Main Entry Point
 */

import { Command } from 'commander';
import { registerRunCommands } from './run';
import { registerMapCommands } from './maps';
import { loadConfig } from '../core/config';
import { exitCodeFor } from '../core/errors';
import { closeLogger, getLogger, initLogger } from '../infra/logger';
import { version as packageVersion } from '../../package.json';
import { printError } from './utils';

// ---------------------------------------------------------------------------
// Global Options Handler
// ---------------------------------------------------------------------------

interface GlobalOptions {
  debug?: boolean;
}

async function applyGlobalOptions(options: GlobalOptions): Promise<void> {
  if (!options.debug) return;

  const config = loadConfig();
  await initLogger({
    level: 'debug',
    dataDir: config.dataDir,
  });
}

// ---------------------------------------------------------------------------
// Main Program
// ---------------------------------------------------------------------------

function createProgram(): Command {
  const program = new Command();

  program
    .name('colonysim')
    .description('Ants wander a tunnel map and destroy every colony they meet in')
    .version(packageVersion)
    .option('--debug', 'Write a debug log under the data directory')
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      await applyGlobalOptions(options);
    });

  registerRunCommands(program);
  registerMapCommands(program);

  return program;
}

// ---------------------------------------------------------------------------
// Error Handling
// ---------------------------------------------------------------------------

function handleError(err: unknown): never {
  printError(err);
  getLogger().child('cli').error('Command failed', { error: err instanceof Error ? err.message : String(err) });

  // In debug mode, show full stack trace
  if (process.env.DEBUG || process.argv.includes('--debug')) {
    if (err instanceof Error && err.stack) {
      console.error('\nStack trace:');
      console.error(err.stack);
    }
  }

  process.exit(exitCodeFor(err));
}

process.on('unhandledRejection', (reason) => {
  handleError(reason);
});

process.on('uncaughtException', (err) => {
  handleError(err);
});

// ---------------------------------------------------------------------------
// Entry Point
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
  await closeLogger();
}

main().catch(handleError);
