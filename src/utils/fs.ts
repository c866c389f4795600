import { promises as fs, constants as fsConstants } from 'fs';
import { resolve } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Absolute, symlink-resolved form of an existing path
 */
export async function toCanonicalPath(path: string): Promise<string> {
  try {
    return await fs.realpath(path);
  } catch (error) {
    throw new FileSystemError(`Failed to canonicalize path: ${path}`, { path, error });
  }
}

/**
 * Canonical form of a path, or undefined when nothing exists there
 */
export async function canonicalIfExists(path: string): Promise<string | undefined> {
  if (!(await exists(path))) {
    return undefined;
  }
  return toCanonicalPath(path);
}

/**
 * Canonical form of a directory when it exists, its absolute form otherwise.
 * `..` candidates below the result then follow the real directory, not a link's parent.
 */
export async function canonicalOrAbsolute(path: string): Promise<string> {
  const absolute = resolve(path);
  return (await canonicalIfExists(absolute)) ?? absolute;
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file (JSON with comments) and parse it.
 * The caller validates the shape of the returned value.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(
      `Failed to parse JSON/JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
      { path, errors }
    );
  }
  return result;
}
