import type { ResolutionError } from '../../utils/errors.js';

/**
 * One dependency resolution request handed to an external resolver.
 */
export interface ResolutionRequest {
  /** Absolute project root the resolver runs in */
  baseDir: string;
  /**
   * Build descriptor (pom.xml, ivy.xml). When absent the resolver applies
   * its own discovery convention.
   */
  descriptor?: string;
  /** Ordered configuration scopes whose artifacts are wanted */
  scopes: readonly string[];
}

export type ResolutionResult =
  | { ok: true; artifacts: string[] }
  | { ok: false; error: ResolutionError };

/**
 * External Resolver Collaborator
 *
 * Performs the actual dependency-graph resolution and artifact download for a
 * build tool. Paths in `artifacts` are local files; the adapters canonicalize
 * them and drop the ones that do not exist.
 */
export interface DependencyResolver {
  resolveDependencies(request: ResolutionRequest): Promise<ResolutionResult>;
}

export function resolved(artifacts: string[]): ResolutionResult {
  return { ok: true, artifacts };
}

export function failed(error: ResolutionError): ResolutionResult {
  return { ok: false, error };
}
