/**
 * Diagnostic Port Interface
 *
 * Write-only sink for the human-readable progress and failure messages the
 * resolution core produces. Core logic uses this interface instead of
 * console.log or @clack/prompts directly; it never reads back from it.
 *
 * Implementations:
 *   - consoleDiagnostics (default/CI): plain console output
 *   - createClackDiagnostics (CLI, TTY): @clack/prompts log lines
 */
export interface DiagnosticSink {
  /** Informational message ("Using conf: compile") */
  info(message: string): void;

  /** Start of a resolution step ("Resolving Maven dependencies...") */
  step(message: string): void;

  /** Recoverable problem that degrades the result */
  warn(message: string): void;

  /** Failure, with the underlying cause when there is one */
  error(message: string, cause?: unknown): void;
}
