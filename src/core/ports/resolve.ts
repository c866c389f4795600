/**
 * Port Resolution Helpers
 *
 * Resolves the DiagnosticSink from an ExecutionContext or adapter options,
 * falling back to the console when none is provided.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { DiagnosticSink } from './diagnostics.js';
import { consoleDiagnostics } from './console-diagnostics.js';

export function resolveDiagnostics(ctx?: ExecutionContext | { diagnostics?: DiagnosticSink }): DiagnosticSink {
  return ctx?.diagnostics ?? consoleDiagnostics;
}
