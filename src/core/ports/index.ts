/**
 * Core Ports
 *
 * Re-exports the port interfaces and default implementations that sit
 * between the resolution core and its callers.
 */

export type { DiagnosticSink } from './diagnostics.js';
export { consoleDiagnostics, silentDiagnostics } from './console-diagnostics.js';
export { resolveDiagnostics } from './resolve.js';
