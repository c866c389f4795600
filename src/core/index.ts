/**
 * buildpath core library
 *
 * Resolves the source roots, compile/runtime/test jars and output directory
 * of Maven, Ivy and sbt projects. This entry point has no terminal/UI
 * dependencies; all progress and failure messages go through the
 * DiagnosticSink port.
 */

// ============================================================================
// Types
// ============================================================================

export type {
  BuildSystem,
  BuildPathSettings,
  ExternalConfig,
  IvyConfs,
  Purpose,
  ResolvedProject,
  ExecutionContext
} from '../types/index.js';
export { BUILD_SYSTEMS, PURPOSES, BuildPathError, ErrorCodes } from '../types/index.js';
export {
  UnsupportedPurposeError,
  ResolutionError,
  FileSystemError,
  ValidationError,
  ConfigError
} from '../utils/errors.js';

// ============================================================================
// Ports
// ============================================================================

export type { DiagnosticSink } from './ports/index.js';
export { consoleDiagnostics, silentDiagnostics } from './ports/index.js';

// ============================================================================
// Resolution
// ============================================================================

export { scopesFor, assertPurpose, isPurpose } from './scopes/index.js';
export { existingOf, expandJars, isJarArchive, type ArchivePredicate } from './probe/index.js';
export {
  adapters,
  resolveMavenConfig,
  resolveIvyConfig,
  resolveSbtConfig,
  createExternalConfig,
  type AdapterOptions,
  type BuildSystemAdapter,
  type MavenAdapterOptions,
  type IvyAdapterOptions,
  type SbtAdapterOptions
} from './adapters/index.js';
export {
  MavenCommandResolver,
  IvyCommandResolver,
  type DependencyResolver,
  type ResolutionRequest,
  type ResolutionResult
} from './resolvers/index.js';
export { detectBuildSystem } from './detect.js';
export { resolveExternalConfig, type ResolveProjectOptions } from './resolve.js';
export { loadSettings } from './settings.js';
