/**
 * File Walker Utility
 *
 * Directory tree traversal used by the jar expansion of library directories.
 * Symbolic links are followed (library folders are often linked); each real
 * directory is visited once.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { errorCode } from './errors.js';

/**
 * Which files to yield. Directories are always descended into.
 */
export type FileFilter = (path: string) => boolean;

/**
 * Async generator that walks a directory tree and yields file paths
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/lib', path => path.endsWith('.jar'))) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(dir: string, filter?: FileFilter): AsyncGenerator<string> {
  yield* walkFilesInternal(dir, filter, new Set());
}

async function* walkFilesInternal(
  dir: string,
  filter: FileFilter | undefined,
  visited: Set<string>
): AsyncGenerator<string> {
  // Linked directories may point back up the tree
  const realDir = await fs.realpath(dir);
  if (visited.has(realDir)) {
    return;
  }
  visited.add(realDir);

  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Ignore permission errors and continue
    const code = errorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();

    if (entry.isSymbolicLink()) {
      try {
        const stat = await fs.stat(fullPath);
        isDirectory = stat.isDirectory();
        isFile = stat.isFile();
      } catch {
        // Broken link
        continue;
      }
    }

    if (isDirectory) {
      yield* walkFilesInternal(fullPath, filter, visited);
    } else if (isFile && (!filter || filter(fullPath))) {
      yield fullPath;
    }
  }
}
