/**
 * Config selection
 *
 * Picks the adapter for a project (explicit choice, settings file, or marker
 * detection) and runs it with options merged from settings and the caller.
 */

import type { BuildPathSettings, BuildSystem, IvySettings, ResolvedProject } from '../types/index.js';
import { BUILD_SYSTEMS } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { isDirectory, toCanonicalPath } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  adapters,
  type IvyAdapterOptions,
  type MavenAdapterOptions,
  type SbtAdapterOptions
} from './adapters/index.js';
import type { DiagnosticSink } from './ports/index.js';
import { detectBuildSystem } from './detect.js';
import { loadSettings } from './settings.js';

export interface ResolveProjectOptions {
  /** Skip detection and use this build system */
  buildSystem?: BuildSystem;
  diagnostics?: DiagnosticSink;
  /** Settings to use instead of reading buildpath.jsonc and the environment */
  settings?: BuildPathSettings;
  maven?: Omit<MavenAdapterOptions, 'diagnostics'>;
  ivy?: Omit<IvyAdapterOptions, 'diagnostics'>;
  sbt?: Omit<SbtAdapterOptions, 'diagnostics'>;
}

export function mavenOptionsFrom(settings: BuildPathSettings, overrides: MavenAdapterOptions = {}): MavenAdapterOptions {
  return {
    ...overrides,
    mavenCommand: overrides.mavenCommand ?? settings.maven?.command
  };
}

export function ivyOptionsFrom(settings: BuildPathSettings, overrides: IvyAdapterOptions = {}): IvyAdapterOptions {
  const ivy: IvySettings = settings.ivy ?? {};
  return {
    ...overrides,
    ivyFile: overrides.ivyFile ?? ivy.file,
    compileConf: overrides.compileConf ?? ivy.compileConf,
    runtimeConf: overrides.runtimeConf ?? ivy.runtimeConf,
    testConf: overrides.testConf ?? ivy.testConf,
    ivyJar: overrides.ivyJar ?? ivy.jar,
    javaCommand: overrides.javaCommand ?? ivy.javaCommand
  };
}

export function sbtOptionsFrom(settings: BuildPathSettings, overrides: SbtAdapterOptions = {}): SbtAdapterOptions {
  return {
    ...overrides,
    defaultScalaVersion: overrides.defaultScalaVersion ?? settings.sbt?.defaultScalaVersion
  };
}

/**
 * Resolve the ExternalConfig of the project at `baseDir`.
 *
 * @throws ValidationError when `baseDir` is not a directory or no build system applies
 * @throws ConfigError when the project's settings file is invalid
 */
export async function resolveExternalConfig(
  baseDir: string,
  options: ResolveProjectOptions = {}
): Promise<ResolvedProject> {
  if (!(await isDirectory(baseDir))) {
    throw new ValidationError(`Project directory does not exist: ${baseDir}`, { baseDir });
  }
  const root = await toCanonicalPath(baseDir);
  const settings = options.settings ?? await loadSettings(root);

  const buildSystem = options.buildSystem ?? settings.buildSystem ?? await detectBuildSystem(root);
  if (!buildSystem) {
    throw new ValidationError(
      `No supported build system found in ${root} (looked for ${FILE_PATTERNS.POM_XML}, ${FILE_PATTERNS.IVY_XML}, project/${FILE_PATTERNS.BUILD_PROPERTIES}); supported: ${BUILD_SYSTEMS.join(', ')}`,
      { baseDir: root }
    );
  }
  logger.debug(`Resolving ${buildSystem} project at ${root}`);

  const diagnostics = options.diagnostics;
  switch (buildSystem) {
    case 'maven':
      return {
        buildSystem,
        baseDir: root,
        config: await adapters.maven.resolve(root, { ...mavenOptionsFrom(settings, options.maven), diagnostics })
      };
    case 'ivy':
      return {
        buildSystem,
        baseDir: root,
        config: await adapters.ivy.resolve(root, { ...ivyOptionsFrom(settings, options.ivy), diagnostics })
      };
    case 'sbt':
      return {
        buildSystem,
        baseDir: root,
        config: await adapters.sbt.resolve(root, { ...sbtOptionsFrom(settings, options.sbt), diagnostics })
      };
  }
}
