/**
 * Common types and interfaces for the buildpath library and CLI
 */

// Re-export context types
export * from './execution-context.js';

// Build model types

/**
 * Logical reason a set of dependency jars is needed.
 */
export type Purpose = 'compile' | 'runtime' | 'test';

export const PURPOSES: readonly Purpose[] = ['compile', 'runtime', 'test'];

/**
 * Build systems whose conventions can be replayed.
 * - 'maven' => pom.xml driven, resolved through Maven
 * - 'ivy'   => ivy.xml driven, resolved through Apache Ivy
 * - 'sbt'   => sbt 0.7 directory conventions (project/build.properties)
 */
export type BuildSystem = 'maven' | 'ivy' | 'sbt';

export const BUILD_SYSTEMS: readonly BuildSystem[] = ['maven', 'ivy', 'sbt'];

/**
 * Configuration names an Ivy build may declare per purpose.
 * Purposes without an entry fall back to the 'default' configuration.
 */
export type IvyConfs = Partial<Record<Purpose, string>>;

/**
 * Resolved project layout and classpath.
 *
 * Every path is absolute, canonical and existed on disk when the value was
 * built. Collections are sorted and free of duplicates; the three jar sets are
 * computed independently and may overlap.
 */
export interface ExternalConfig {
  readonly projectName?: string;
  readonly sourceRoots: readonly string[];
  readonly compileDepJars: readonly string[];
  readonly runtimeDepJars: readonly string[];
  readonly testDepJars: readonly string[];
  readonly target?: string;
}

export interface ResolvedProject {
  buildSystem: BuildSystem;
  baseDir: string;
  config: ExternalConfig;
}

// Settings file types (buildpath.jsonc)

export interface MavenSettings {
  command?: string;
}

export interface IvySettings {
  file?: string;
  compileConf?: string;
  runtimeConf?: string;
  testConf?: string;
  jar?: string;
  javaCommand?: string;
}

export interface SbtSettings {
  defaultScalaVersion?: string;
}

export interface BuildPathSettings {
  buildSystem?: BuildSystem;
  maven?: MavenSettings;
  ivy?: IvySettings;
  sbt?: SbtSettings;
}

// Command result types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class BuildPathError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'BuildPathError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNSUPPORTED_PURPOSE = 'UNSUPPORTED_PURPOSE',
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
