/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext commands run in.
 *
 * - sourceCwd: where relative command arguments are resolved
 * - targetDir: the directory commands operate on (--cwd, or the cwd)
 */

import { resolve } from 'path';
import { stat, access, constants as fsConstants } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError, errorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * @throws ValidationError if the target directory is missing or unreadable
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  const targetDir = options.cwd ? resolve(sourceCwd, options.cwd) : sourceCwd;

  const context: ExecutionContext = {
    sourceCwd,
    targetDir
  };

  await validateExecutionContext(context);

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    targetDir: context.targetDir
  });

  return context;
}

/**
 * Resolution only reads the project, so the target must be a readable
 * directory; it need not be writable.
 */
async function validateExecutionContext(context: ExecutionContext): Promise<void> {
  try {
    const targetStat = await stat(context.targetDir);
    if (!targetStat.isDirectory()) {
      throw new ValidationError(`Target path is not a directory: ${context.targetDir}`);
    }
    await access(context.targetDir, fsConstants.R_OK);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new ValidationError(
        `Target directory does not exist: ${context.targetDir}\n\n` +
        `Hint: Create the directory or specify a different target with --cwd`
      );
    }
    if (code === 'EACCES') {
      throw new ValidationError(
        `Target directory is not readable: ${context.targetDir}\n\n` +
        `Hint: Check directory permissions`
      );
    }
    throw new ValidationError(
      `Invalid target directory: ${context.targetDir}\n` +
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Resolve a command's project argument against the context.
 * Relative paths are taken from targetDir, so `--cwd a b` means `a/b`.
 */
export function resolveProjectDir(context: ExecutionContext, dir?: string): string {
  return dir ? resolveArgumentPath(context, dir) : context.targetDir;
}

/**
 * Resolve a path typed on the command line. Like the project argument it is
 * taken from targetDir, never from the project directory.
 */
export function resolveArgumentPath(context: ExecutionContext, path: string): string {
  return resolve(context.targetDir, path);
}
