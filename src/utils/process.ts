import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { describeError } from './errors.js';

const execFileAsync = promisify(execFile);

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external tool to completion. Rejects when the tool cannot be
 * started or exits non-zero.
 */
export type ProcessRunner = (command: string, args: string[], options: { cwd: string }) => Promise<ProcessOutput>;

export const runProcess: ProcessRunner = async (command, args, options) => {
  logger.debug(`Running: ${command} ${args.join(' ')}`, { cwd: options.cwd });
  const { stdout, stderr } = await execFileAsync(command, args, {
    cwd: options.cwd,
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024
  });
  if (stdout.trim()) {
    logger.debug(stdout.trim());
  }
  if (stderr.trim()) {
    logger.debug(stderr.trim());
  }
  return { stdout, stderr };
};

/**
 * Best one-line reason for a failed process: its stderr when it wrote one.
 */
export function describeProcessFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) {
      return stderr;
    }
  }
  return describeError(error);
}
