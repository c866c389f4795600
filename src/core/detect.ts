import { join, resolve } from 'path';
import type { BuildSystem } from '../types/index.js';
import { FILE_PATTERNS, SBT_PATHS } from '../constants/index.js';
import { canonicalOrAbsolute, isFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Which build system manages `baseDir`, by its marker files:
 * pom.xml, then ivy.xml, then an sbt build.properties in the project or its parent.
 */
export async function detectBuildSystem(baseDir: string): Promise<BuildSystem | undefined> {
  const root = await canonicalOrAbsolute(baseDir);

  if (await isFile(join(root, FILE_PATTERNS.POM_XML))) {
    logger.debug(`Detected Maven project at ${root}`);
    return 'maven';
  }
  if (await isFile(join(root, FILE_PATTERNS.IVY_XML))) {
    logger.debug(`Detected Ivy project at ${root}`);
    return 'ivy';
  }
  if (
    await isFile(join(root, SBT_PATHS.PROJECT_PROPERTIES)) ||
    await isFile(resolve(root, SBT_PATHS.PARENT_PROJECT_PROPERTIES))
  ) {
    logger.debug(`Detected sbt project at ${root}`);
    return 'sbt';
  }

  logger.debug(`No build system detected at ${root}`);
  return undefined;
}
