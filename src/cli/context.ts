/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's diagnostic sink injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { silentDiagnostics } from '../core/ports/console-diagnostics.js';
import type { DiagnosticSink } from '../core/ports/diagnostics.js';
import { createClackDiagnostics, createPlainDiagnostics } from './clack-diagnostics-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  /** Suppress diagnostics entirely (--quiet) */
  quiet?: boolean;
}

/** Cached sink singletons for the lifetime of the CLI process. */
let cachedClackDiagnostics: DiagnosticSink | undefined;
let cachedPlainDiagnostics: DiagnosticSink | undefined;

function getCliDiagnostics(isInteractive: boolean): DiagnosticSink {
  if (isInteractive) {
    cachedClackDiagnostics ??= createClackDiagnostics();
    return cachedClackDiagnostics;
  }
  cachedPlainDiagnostics ??= createPlainDiagnostics();
  return cachedPlainDiagnostics;
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with the CLI diagnostic sink injected.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.diagnostics = options.quiet
    ? silentDiagnostics
    : getCliDiagnostics(detectInteractive(options.interactive));
  return ctx;
}
