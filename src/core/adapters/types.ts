import type { BuildSystem, ExternalConfig } from '../../types/index.js';
import type { DiagnosticSink } from '../ports/index.js';
import type { DependencyResolver } from '../resolvers/index.js';

export interface AdapterOptions {
  /** Where progress and failure messages go (default: console) */
  diagnostics?: DiagnosticSink;
}

export interface MavenAdapterOptions extends AdapterOptions {
  /** Resolver for the pom.xml (default: MavenCommandResolver) */
  resolver?: DependencyResolver;
  /** Maven executable for the default resolver */
  mavenCommand?: string;
}

export interface IvyAdapterOptions extends AdapterOptions {
  /** Resolver for the ivy file (default: IvyCommandResolver) */
  resolver?: DependencyResolver;
  /** Explicit ivy descriptor; the resolver's discovery applies when absent */
  ivyFile?: string;
  compileConf?: string;
  runtimeConf?: string;
  testConf?: string;
  /** Standalone ivy jar for the default resolver */
  ivyJar?: string;
  /** Java executable for the default resolver */
  javaCommand?: string;
}

export interface SbtAdapterOptions extends AdapterOptions {
  /** Scala version assumed when build.properties names none (default: 2.8.0) */
  defaultScalaVersion?: string;
}

export interface AdapterOptionsMap {
  maven: MavenAdapterOptions;
  ivy: IvyAdapterOptions;
  sbt: SbtAdapterOptions;
}

/**
 * Per-build-system strategy that knows the system's directory and scope
 * conventions. `resolve` never rejects for missing inputs or resolver
 * failures; it returns a config with whatever could be determined.
 */
export interface BuildSystemAdapter<K extends BuildSystem = BuildSystem> {
  readonly kind: K;
  resolve(baseDir: string, options?: AdapterOptionsMap[K]): Promise<ExternalConfig>;
}
