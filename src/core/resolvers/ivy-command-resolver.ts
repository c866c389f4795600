/**
 * Ivy dependency resolver backed by the standalone Apache Ivy jar.
 *
 * Runs `java -jar ivy.jar -confs <conf> -cachepath <file>`; Ivy resolves the
 * configuration, retrieves it into its cache and writes the resulting
 * classpath to the report file.
 */

import { delimiter, join } from 'path';
import { DEFAULT_COMMANDS, ENV_VARS, FILE_PATTERNS } from '../../constants/index.js';
import { ResolutionError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { runProcess, describeProcessFailure, type ProcessRunner } from '../../utils/process.js';
import { withToolOutputFile } from './output-file.js';
import { failed, resolved, type DependencyResolver, type ResolutionRequest, type ResolutionResult } from './types.js';

export interface IvyCommandResolverOptions {
  /** Path to the standalone ivy jar */
  ivyJar?: string;
  /** Java executable (default: java) */
  javaCommand?: string;
  run?: ProcessRunner;
}

/**
 * Split an Ivy cachepath report into artifact paths.
 */
export function parseCachePath(report: string, pathDelimiter: string = delimiter): string[] {
  return report
    .split(/\r?\n/)
    .flatMap(line => line.split(pathDelimiter))
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

export class IvyCommandResolver implements DependencyResolver {
  private readonly ivyJar?: string;
  private readonly javaCommand: string;
  private readonly run: ProcessRunner;

  constructor(options: IvyCommandResolverOptions = {}) {
    this.ivyJar = options.ivyJar;
    this.javaCommand = options.javaCommand ?? DEFAULT_COMMANDS.JAVA;
    this.run = options.run ?? runProcess;
  }

  async resolveDependencies(request: ResolutionRequest): Promise<ResolutionResult> {
    const ivyJar = this.ivyJar;
    if (!ivyJar) {
      return failed(new ResolutionError(
        `No Ivy jar configured (set ${ENV_VARS.IVY_JAR} or ivy.jar in ${FILE_PATTERNS.SETTINGS_FILES[0]})`,
        { scopes: request.scopes }
      ));
    }
    if (!(await exists(ivyJar))) {
      return failed(new ResolutionError(`Ivy jar not found: ${ivyJar}`, { scopes: request.scopes }));
    }

    // Ivy's own convention: ivy.xml in the directory it runs from
    const descriptor = request.descriptor ?? join(request.baseDir, FILE_PATTERNS.IVY_XML);
    if (!(await exists(descriptor))) {
      return failed(new ResolutionError(`Ivy file not found: ${descriptor}`, { descriptor, scopes: request.scopes }));
    }

    return withToolOutputFile('ivy', async outputFile => {
      try {
        await this.run(this.javaCommand, [
          '-jar', ivyJar,
          '-ivy', descriptor,
          '-confs', request.scopes.join(','),
          '-cachepath', outputFile
        ], { cwd: request.baseDir });
      } catch (error) {
        return failed(new ResolutionError(
          `Ivy dependency resolution failed: ${describeProcessFailure(error)}`,
          { descriptor, scopes: request.scopes, cause: error }
        ));
      }

      if (!(await exists(outputFile))) {
        return failed(new ResolutionError('Ivy did not write a classpath report', { descriptor, scopes: request.scopes }));
      }
      return resolved(parseCachePath(await readTextFile(outputFile)));
    });
  }
}
