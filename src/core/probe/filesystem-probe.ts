/**
 * Filesystem Probe
 *
 * Existence checks and jar discovery over conventional project directories.
 * Every path returned is absolute and canonical (symlinks resolved), so
 * results from different probes compare equal by string.
 */

import { isAbsolute, resolve } from 'path';
import { FILE_PATTERNS, SOURCE_ROOT_CANDIDATES } from '../../constants/index.js';
import { canonicalIfExists, isDirectory, toCanonicalPath } from '../../utils/fs.js';
import { walkFiles } from '../../utils/file-walker.js';
import { logger } from '../../utils/logger.js';

export type ArchivePredicate = (path: string) => boolean;

function toSortedUnique(paths: Iterable<string>): string[] {
  return Array.from(new Set(paths)).sort();
}

/**
 * Conventional jar-like archive check: `.jar` or `.zip`, any case.
 */
export function isJarArchive(path: string): boolean {
  const lower = path.toLowerCase();
  return FILE_PATTERNS.ARCHIVE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Canonical forms of the candidates that exist under `baseDir`.
 * Missing candidates are dropped: optional directories are routinely absent.
 */
export async function existingOf(baseDir: string, relativePaths: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  for (const relativePath of relativePaths) {
    const canonical = await canonicalIfExists(resolve(baseDir, relativePath));
    if (canonical) {
      found.push(canonical);
    }
  }
  return toSortedUnique(found);
}

/**
 * Canonical form of the first candidate that exists under `baseDir`.
 */
export async function firstExisting(baseDir: string, relativePaths: readonly string[]): Promise<string | undefined> {
  for (const relativePath of relativePaths) {
    const canonical = await canonicalIfExists(resolve(baseDir, relativePath));
    if (canonical) {
      return canonical;
    }
  }
  return undefined;
}

/**
 * Canonical forms of the absolute paths that exist.
 * Resolver output goes through here so no missing artifact leaks into a config.
 */
export async function canonicalizeExisting(paths: Iterable<string>): Promise<string[]> {
  const found: string[] = [];
  for (const path of paths) {
    const canonical = await canonicalIfExists(path);
    if (canonical) {
      found.push(canonical);
    } else {
      logger.debug(`Dropping missing artifact: ${path}`);
    }
  }
  return toSortedUnique(found);
}

/**
 * Every regular file satisfying `isArchive` below the existing `rootDirs`,
 * at any depth. Relative roots are taken from `baseDir`; roots that do not
 * exist are skipped.
 */
export async function expandJars(
  baseDir: string,
  rootDirs: readonly string[],
  isArchive: ArchivePredicate = isJarArchive
): Promise<string[]> {
  const jars: string[] = [];
  for (const rootDir of rootDirs) {
    const root = isAbsolute(rootDir) ? rootDir : resolve(baseDir, rootDir);
    if (!(await isDirectory(root))) {
      continue;
    }
    for await (const filePath of walkFiles(root, isArchive)) {
      jars.push(await toCanonicalPath(filePath));
    }
  }
  return toSortedUnique(jars);
}

/**
 * Source roots of the standard src/{main,test}/{scala,java} layout.
 */
export function conventionalSourceRoots(baseDir: string): Promise<string[]> {
  return existingOf(baseDir, SOURCE_ROOT_CANDIDATES);
}
