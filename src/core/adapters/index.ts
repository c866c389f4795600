/**
 * Build-system adapters
 *
 * One adapter per supported build system, each turning a project root into an
 * ExternalConfig:
 * - maven-adapter.ts: pom.xml resolved through an external Maven resolver
 * - ivy-adapter.ts: ivy.xml resolved through an external Ivy resolver
 * - sbt-adapter.ts: sbt 0.7 directory conventions, no resolver
 */

import type { BuildSystem } from '../../types/index.js';
import { mavenAdapter } from './maven-adapter.js';
import { ivyAdapter } from './ivy-adapter.js';
import { sbtAdapter } from './sbt-adapter.js';
import type { BuildSystemAdapter } from './types.js';

export const adapters: { readonly [K in BuildSystem]: BuildSystemAdapter<K> } = {
  maven: mavenAdapter,
  ivy: ivyAdapter,
  sbt: sbtAdapter
};

export type {
  AdapterOptions,
  AdapterOptionsMap,
  BuildSystemAdapter,
  MavenAdapterOptions,
  IvyAdapterOptions,
  SbtAdapterOptions
} from './types.js';
export { createExternalConfig, type ExternalConfigInit } from './external-config.js';
export { resolveMavenConfig, mavenAdapter } from './maven-adapter.js';
export { resolveIvyConfig, ivyAdapter } from './ivy-adapter.js';
export {
  resolveSbtConfig,
  sbtAdapter,
  loadSbtBuildProperties,
  sbtLibraryDirs,
  sbtTargetCandidates,
  type SbtBuildProperties
} from './sbt-adapter.js';
