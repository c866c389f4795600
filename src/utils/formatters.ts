import { relative, isAbsolute, delimiter } from 'path';
import type { ExternalConfig, ResolvedProject } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a path for display: relative to `baseDir` when inside it,
 * absolute otherwise.
 *
 * @example
 * formatPathForDisplay('/work/app/src/main/java', '/work/app') // => 'src/main/java'
 * formatPathForDisplay('/home/u/.m2/repository/a.jar', '/work/app') // => '/home/u/.m2/repository/a.jar'
 */
export function formatPathForDisplay(path: string, baseDir: string): string {
  if (!isAbsolute(path)) {
    return path;
  }
  const relativePath = relative(baseDir, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }
  return path;
}

function formatSection(title: string, paths: readonly string[], baseDir: string): string[] {
  const lines = [`${title} (${paths.length})`];
  for (const path of paths) {
    lines.push(`  ${formatPathForDisplay(path, baseDir)}`);
  }
  return lines;
}

/**
 * Human-readable summary of a resolved project.
 */
export function formatResolvedProject(project: ResolvedProject): string {
  const { config, baseDir } = project;
  const lines = [
    `Project: ${config.projectName ?? '(unnamed)'}`,
    `Build system: ${project.buildSystem}`,
    `Base directory: ${baseDir}`,
    `Target: ${config.target ? formatPathForDisplay(config.target, baseDir) : '(none)'}`,
    ...formatSection('Source roots', config.sourceRoots, baseDir),
    ...formatSection('Compile jars', config.compileDepJars, baseDir),
    ...formatSection('Runtime jars', config.runtimeDepJars, baseDir),
    ...formatSection('Test jars', config.testDepJars, baseDir)
  ];
  return lines.join('\n');
}

/**
 * JSON document for `resolve --json`; absent optional fields are null so
 * consumers see every key.
 */
export function toJsonDocument(project: ResolvedProject): Record<string, unknown> {
  const config: ExternalConfig = project.config;
  return {
    buildSystem: project.buildSystem,
    baseDir: project.baseDir,
    projectName: config.projectName ?? null,
    sourceRoots: config.sourceRoots,
    compileDepJars: config.compileDepJars,
    runtimeDepJars: config.runtimeDepJars,
    testDepJars: config.testDepJars,
    target: config.target ?? null
  };
}

/**
 * Platform classpath string (entries joined by ':' or ';').
 */
export function formatClasspath(paths: readonly string[], pathDelimiter: string = delimiter): string {
  return paths.join(pathDelimiter);
}
