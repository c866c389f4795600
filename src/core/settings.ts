import { join } from 'path';
import type { BuildPathSettings, BuildSystem, IvySettings, MavenSettings, SbtSettings } from '../types/index.js';
import { BUILD_SYSTEMS } from '../types/index.js';
import { ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Per-project settings for buildpath
 * Read from buildpath.jsonc or buildpath.json in the project root, then
 * overlaid with BUILDPATH_* environment variables.
 */

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBuildSystem(value: unknown): value is BuildSystem {
  return typeof value === 'string' && BUILD_SYSTEMS.some(system => system === value);
}

function readSection(raw: JsonObject, section: string, keys: readonly string[], file: string): Record<string, string> | undefined {
  const value = raw[section];
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigError(`Invalid settings in ${file}: '${section}' must be an object`, { file, section });
  }

  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!keys.includes(key)) {
      throw new ConfigError(`Invalid settings in ${file}: unknown key '${section}.${key}'`, { file, key });
    }
    if (typeof entry !== 'string') {
      throw new ConfigError(`Invalid settings in ${file}: '${section}.${key}' must be a string`, { file, key });
    }
    result[key] = entry;
  }
  return result;
}

/**
 * Validate the parsed contents of a settings file.
 */
export function parseSettings(raw: unknown, file: string): BuildPathSettings {
  if (!isObject(raw)) {
    throw new ConfigError(`Invalid settings in ${file}: expected an object`, { file });
  }

  for (const key of Object.keys(raw)) {
    if (!['buildSystem', 'maven', 'ivy', 'sbt'].includes(key)) {
      throw new ConfigError(`Invalid settings in ${file}: unknown key '${key}'`, { file, key });
    }
  }

  const settings: BuildPathSettings = {};

  if (raw.buildSystem !== undefined) {
    if (!isBuildSystem(raw.buildSystem)) {
      throw new ConfigError(
        `Invalid settings in ${file}: buildSystem must be one of ${BUILD_SYSTEMS.join(', ')}`,
        { file, buildSystem: raw.buildSystem }
      );
    }
    settings.buildSystem = raw.buildSystem;
  }

  const maven: MavenSettings | undefined = readSection(raw, 'maven', ['command'], file);
  if (maven) {
    settings.maven = maven;
  }
  const ivy: IvySettings | undefined = readSection(
    raw,
    'ivy',
    ['file', 'compileConf', 'runtimeConf', 'testConf', 'jar', 'javaCommand'],
    file
  );
  if (ivy) {
    settings.ivy = ivy;
  }
  const sbt: SbtSettings | undefined = readSection(raw, 'sbt', ['defaultScalaVersion'], file);
  if (sbt) {
    settings.sbt = sbt;
  }

  return settings;
}

/**
 * Overlay BUILDPATH_* environment variables on file settings.
 */
export function applyEnvironment(settings: BuildPathSettings, env: NodeJS.ProcessEnv = process.env): BuildPathSettings {
  const result: BuildPathSettings = { ...settings };
  const mavenCommand = env[ENV_VARS.MAVEN_COMMAND];
  if (mavenCommand) {
    result.maven = { ...result.maven, command: mavenCommand };
  }
  const ivyJar = env[ENV_VARS.IVY_JAR];
  if (ivyJar) {
    result.ivy = { ...result.ivy, jar: ivyJar };
  }
  const javaCommand = env[ENV_VARS.JAVA_COMMAND];
  if (javaCommand) {
    result.ivy = { ...result.ivy, javaCommand };
  }
  return result;
}

/**
 * Find the settings file of a project, if it has one
 */
export async function findSettingsFile(projectDir: string): Promise<string | undefined> {
  for (const fileName of FILE_PATTERNS.SETTINGS_FILES) {
    const path = join(projectDir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return undefined;
}

/**
 * Load the settings governing `projectDir`
 */
export async function loadSettings(projectDir: string, env: NodeJS.ProcessEnv = process.env): Promise<BuildPathSettings> {
  const file = await findSettingsFile(projectDir);
  if (!file) {
    logger.debug(`No settings file in ${projectDir}`);
    return applyEnvironment({}, env);
  }

  logger.debug(`Loading settings from: ${file}`);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(file);
  } catch (error) {
    throw new ConfigError(`Failed to read settings file: ${file}`, { file, error });
  }
  return applyEnvironment(parseSettings(raw, file), env);
}
