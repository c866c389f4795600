/**
 * Convention-based ("sbt-style") adapter
 *
 * Replays the sbt 0.7 layout: project metadata in project/build.properties
 * (or the parent's, for a subproject), jars in lib/, in the Scala boot
 * directory and in lib_managed/scala_<version>/<configuration>. No resolver
 * runs; everything is found on disk.
 */

import { join, resolve } from 'path';
import type { ExternalConfig, Purpose } from '../../types/index.js';
import { DEFAULT_SBT_SCALA_VERSION, SBT_PATHS, SBT_PROPERTY_KEYS } from '../../constants/index.js';
import { canonicalOrAbsolute, exists } from '../../utils/fs.js';
import { readPropertiesFile } from '../../utils/properties.js';
import { existingOf, expandJars, firstExisting, conventionalSourceRoots } from '../probe/index.js';
import { resolveDiagnostics, type DiagnosticSink } from '../ports/index.js';
import { scopesFor } from '../scopes/index.js';
import { createExternalConfig } from './external-config.js';
import { forEachPurpose } from './dependency-sets.js';
import type { BuildSystemAdapter, SbtAdapterOptions } from './types.js';

export interface SbtBuildProperties {
  /** Properties file the project settings were read from */
  file: string;
  /** True when the file belongs to the parent project */
  isSubProject: boolean;
  scalaVersion: string;
  projectName?: string;
}

/**
 * Locate and read the build.properties governing `baseDir`: its own
 * project/build.properties first, then the parent's.
 */
export async function loadSbtBuildProperties(
  baseDir: string,
  defaultScalaVersion: string = DEFAULT_SBT_SCALA_VERSION
): Promise<SbtBuildProperties | undefined> {
  const root = await canonicalOrAbsolute(baseDir);
  const projectProps = join(root, SBT_PATHS.PROJECT_PROPERTIES);
  const parentProjectProps = resolve(root, SBT_PATHS.PARENT_PROJECT_PROPERTIES);

  let file: string;
  let isSubProject: boolean;
  if (await exists(projectProps)) {
    file = projectProps;
    isSubProject = false;
  } else if (await exists(parentProjectProps)) {
    file = parentProjectProps;
    isSubProject = true;
  } else {
    return undefined;
  }

  const props = await readPropertiesFile(file);
  const projectName = props.get(SBT_PROPERTY_KEYS.PROJECT_NAME);
  return {
    file,
    isSubProject,
    scalaVersion: props.get(SBT_PROPERTY_KEYS.SCALA_VERSIONS) ?? defaultScalaVersion,
    ...(projectName !== undefined ? { projectName } : {})
  };
}

/**
 * Candidate jar directories for one purpose, relative to the project root:
 * unmanaged lib/, the Scala boot library, then one managed directory per scope.
 */
export function sbtLibraryDirs(scalaVersion: string, purpose: Purpose, isSubProject: boolean): string[] {
  const bootLibDir = `${isSubProject ? '../' : ''}project/boot/scala-${scalaVersion}/lib`;
  const managedDirs = scopesFor('sbt', purpose).map(scope => `lib_managed/scala_${scalaVersion}/${scope}`);
  return [SBT_PATHS.UNMANAGED_LIB, bootLibDir, ...managedDirs];
}

/**
 * Compiled-output directories, first match wins.
 */
export function sbtTargetCandidates(scalaVersion: string): string[] {
  return [`target/scala_${scalaVersion}/classes`, `scala_${scalaVersion}/classes`];
}

async function resolveSbtDeps(
  root: string,
  build: SbtBuildProperties,
  purpose: Purpose,
  diagnostics: DiagnosticSink
): Promise<string[]> {
  diagnostics.step('Resolving sbt dependencies...');
  diagnostics.info(`Using build config '${purpose}'`);
  const jarDirs = sbtLibraryDirs(build.scalaVersion, purpose, build.isSubProject);
  diagnostics.info(`Searching for dependencies in [${jarDirs.join(', ')}]`);
  const jarRoots = await existingOf(root, jarDirs);
  return expandJars(root, jarRoots);
}

export async function resolveSbtConfig(baseDir: string, options: SbtAdapterOptions = {}): Promise<ExternalConfig> {
  const root = await canonicalOrAbsolute(baseDir);
  const diagnostics = resolveDiagnostics(options);

  const sourceRoots = await conventionalSourceRoots(root);

  let build: SbtBuildProperties | undefined;
  try {
    build = await loadSbtBuildProperties(root, options.defaultScalaVersion);
  } catch (error) {
    diagnostics.error('Could not read build.properties file!', error);
    return createExternalConfig({ sourceRoots });
  }
  if (!build) {
    diagnostics.error('Could not locate build.properties file!');
    return createExternalConfig({ sourceRoots });
  }
  diagnostics.info(`Loading sbt build.properties from ${build.file}.`);

  const props = build;
  const deps = await forEachPurpose(purpose => resolveSbtDeps(root, props, purpose, diagnostics));

  return createExternalConfig({
    projectName: props.projectName,
    sourceRoots,
    compileDepJars: deps.compile,
    runtimeDepJars: deps.runtime,
    testDepJars: deps.test,
    target: await firstExisting(root, sbtTargetCandidates(props.scalaVersion))
  });
}

export const sbtAdapter: BuildSystemAdapter<'sbt'> = {
  kind: 'sbt',
  resolve: resolveSbtConfig
};
