/**
 * Console Diagnostics Adapter (Default/CI)
 *
 * Plain console implementation of DiagnosticSink. Progress goes to stdout,
 * failures and their causes to stderr.
 */

import type { DiagnosticSink } from './diagnostics.js';

export const consoleDiagnostics: DiagnosticSink = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  error(message: string, cause?: unknown): void {
    console.error(`✗ ${message}`);
    if (cause instanceof Error && cause.stack) {
      console.error(cause.stack);
    } else if (cause !== undefined) {
      console.error(String(cause));
    }
  },
};

/**
 * Sink that drops every message, for library callers that want data only.
 */
export const silentDiagnostics: DiagnosticSink = {
  info(): void {},
  step(): void {},
  warn(): void {},
  error(): void {},
};
