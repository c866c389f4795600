#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupResolveCommand } from './commands/resolve.js';
import { setupDetectCommand } from './commands/detect.js';
import { setupScopesCommand } from './commands/scopes.js';

/**
 * buildpath CLI - Main entry point
 *
 * Resolves the source roots and classpaths of Maven, Ivy and sbt projects.
 */

export function createProgram(): Command {
  const program = new Command();

  program
    .name('buildpath')
    .description('Resolve source roots and compile/runtime/test classpaths of JVM projects')
    .version(getVersion())
    .option('--cwd <dir>', 'set working directory')
    .option('--verbose', 'log debug output to stderr')
    .configureHelp({
      sortSubcommands: true
    });

  setupResolveCommand(program);
  setupDetectCommand(program);
  setupScopesCommand(program);

  program.hook('preAction', () => {
    const opts = program.opts<{ verbose?: boolean }>();
    if (opts.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
    logger.debug(`Working directory: ${process.cwd()}`);
  });

  return program;
}

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  try {
    // If no arguments provided (just 'buildpath'), show help and exit successfully
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exitCode = 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason });
    console.error('❌ An unexpected error occurred. Use --verbose for details.');
    process.exit(1);
  });

  await run();
}
