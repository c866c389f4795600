/**
 * Maven dependency resolver backed by the maven-dependency-plugin.
 *
 * Runs `dependency:list` with absolute artifact file names written to a
 * report file, then keeps the artifacts whose scope was requested.
 */

import { join } from 'path';
import { MAVEN_PATHS, DEFAULT_COMMANDS } from '../../constants/index.js';
import { ResolutionError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { runProcess, describeProcessFailure, type ProcessRunner } from '../../utils/process.js';
import { withToolOutputFile } from './output-file.js';
import { failed, resolved, type DependencyResolver, type ResolutionRequest, type ResolutionResult } from './types.js';

const MAVEN_SCOPE_NAMES = new Set(['compile', 'provided', 'runtime', 'test', 'system', 'import']);

export interface MavenArtifact {
  coordinates: string;
  scope: string;
  file: string;
}

export interface MavenCommandResolverOptions {
  /** Maven executable (default: mvn) */
  command?: string;
  run?: ProcessRunner;
}

/**
 * Parse one report line of `dependency:list -DoutputAbsoluteArtifactFilename=true`:
 *   group:artifact:type[:classifier]:version:scope:/abs/path.jar[ (optional)][ -- module name]
 * Returns undefined for headers, blank lines and entries without a file.
 */
export function parseDependencyListLine(line: string): MavenArtifact | undefined {
  const entry = line
    .replace(/\s+--\s+module\s.*$/, '')
    .replace(/\s+\(optional\)\s*$/, '')
    .trim();
  const parts = entry.split(':');
  if (parts.length < 6) {
    return undefined;
  }

  // Classifier-less entries put the scope fifth, classified ones sixth.
  // File paths may contain ':' themselves (Windows drives), so re-join the tail.
  for (const scopeIndex of [4, 5]) {
    const scope = parts[scopeIndex];
    if (scope !== undefined && MAVEN_SCOPE_NAMES.has(scope) && parts.length > scopeIndex + 1) {
      const file = parts.slice(scopeIndex + 1).join(':').trim();
      if (!file) {
        return undefined;
      }
      return {
        coordinates: parts.slice(0, scopeIndex).join(':'),
        scope,
        file
      };
    }
  }
  return undefined;
}

export function parseDependencyList(report: string): MavenArtifact[] {
  const artifacts: MavenArtifact[] = [];
  for (const line of report.split(/\r?\n/)) {
    const artifact = parseDependencyListLine(line);
    if (artifact) {
      artifacts.push(artifact);
    }
  }
  return artifacts;
}

export class MavenCommandResolver implements DependencyResolver {
  private readonly command: string;
  private readonly run: ProcessRunner;

  constructor(options: MavenCommandResolverOptions = {}) {
    this.command = options.command ?? DEFAULT_COMMANDS.MAVEN;
    this.run = options.run ?? runProcess;
  }

  async resolveDependencies(request: ResolutionRequest): Promise<ResolutionResult> {
    const pom = request.descriptor ?? join(request.baseDir, MAVEN_PATHS.POM);
    if (!(await exists(pom))) {
      return failed(new ResolutionError(`POM file not found: ${pom}`, { descriptor: pom, scopes: request.scopes }));
    }

    return withToolOutputFile('mvn', async outputFile => {
      try {
        await this.run(this.command, [
          '-B',
          '-q',
          '-f', pom,
          'dependency:list',
          '-DoutputAbsoluteArtifactFilename=true',
          `-DoutputFile=${outputFile}`,
          '-DappendOutput=false'
        ], { cwd: request.baseDir });
      } catch (error) {
        return failed(new ResolutionError(
          `Maven dependency resolution failed: ${describeProcessFailure(error)}`,
          { descriptor: pom, scopes: request.scopes, cause: error }
        ));
      }

      if (!(await exists(outputFile))) {
        return failed(new ResolutionError('Maven did not write a dependency report', { descriptor: pom, scopes: request.scopes }));
      }

      const wanted = new Set(request.scopes);
      const artifacts = parseDependencyList(await readTextFile(outputFile))
        .filter(artifact => wanted.has(artifact.scope))
        .map(artifact => artifact.file);
      return resolved(artifacts);
    });
  }
}
