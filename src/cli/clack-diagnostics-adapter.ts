/**
 * Clack Diagnostics Adapter
 *
 * CLI-specific DiagnosticSink that routes to @clack/prompts log lines for
 * interactive terminal sessions. Non-interactive sessions get the plain
 * stderr sink below so stdout only ever carries the command's result.
 */

import { log } from '@clack/prompts';
import type { DiagnosticSink } from '../core/ports/diagnostics.js';

function causeText(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Create a Clack-based DiagnosticSink for interactive terminal sessions.
 * Clack writes to stdout, so this is only used when stdout is a TTY.
 */
export function createClackDiagnostics(): DiagnosticSink {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    error(message: string, cause?: unknown): void {
      const detail = causeText(cause);
      log.error(detail ? `${message}\n${detail}` : message);
    },
  };
}

/**
 * Create a plain DiagnosticSink writing to stderr, for CI and piped output.
 */
export function createPlainDiagnostics(): DiagnosticSink {
  return {
    info(message: string): void {
      console.error(message);
    },

    step(message: string): void {
      console.error(message);
    },

    warn(message: string): void {
      console.error(`⚠️  ${message}`);
    },

    error(message: string, cause?: unknown): void {
      console.error(`❌ ${message}`);
      const detail = causeText(cause);
      if (detail) {
        console.error(`   ${detail}`);
      }
    },
  };
}
