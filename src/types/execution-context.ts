/**
 * Execution Context Types
 *
 * Type definitions for the context threaded from the command layer into the
 * resolution core.
 */

import type { DiagnosticSink } from '../core/ports/diagnostics.js';

/**
 * ExecutionContext - where a command runs and where its messages go
 */
export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   * Used for resolving input arguments (e.g., ./service, ../app).
   */
  sourceCwd: string;

  /**
   * Absolute path of the directory commands operate on.
   * - For normal commands: current working directory
   * - For --cwd commands: specified directory
   */
  targetDir: string;

  /**
   * Diagnostic sink for progress and failure messages.
   * When not provided, defaults to consoleDiagnostics (plain console).
   */
  diagnostics?: DiagnosticSink;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * --cwd flag: Explicit target directory
   */
  cwd?: string;
}
