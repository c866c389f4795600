import type { Purpose } from '../../types/index.js';
import { ResolutionError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { canonicalizeExisting } from '../probe/index.js';
import type { DiagnosticSink } from '../ports/index.js';
import type { DependencyResolver, ResolutionRequest, ResolutionResult } from '../resolvers/index.js';

async function callResolver(resolver: DependencyResolver, request: ResolutionRequest): Promise<ResolutionResult> {
  try {
    return await resolver.resolveDependencies(request);
  } catch (error) {
    const resolutionError = error instanceof ResolutionError
      ? error
      : new ResolutionError(describeError(error), { descriptor: request.descriptor, scopes: request.scopes, cause: error });
    return { ok: false, error: resolutionError };
  }
}

/**
 * One purpose's dependency jars from an external resolver.
 *
 * A failed or throwing resolver is reported through `diagnostics` and yields
 * an empty set, leaving the other purposes of the same call untouched.
 */
export async function resolveDependencySet(
  resolver: DependencyResolver,
  request: ResolutionRequest,
  diagnostics: DiagnosticSink,
  failureMessage: string
): Promise<string[]> {
  const result = await callResolver(resolver, request);
  if (!result.ok) {
    diagnostics.error(failureMessage, result.error);
    logger.debug(failureMessage, { scopes: request.scopes, error: result.error.message });
    return [];
  }
  return canonicalizeExisting(result.artifacts);
}

/**
 * Computes one jar set per purpose, sequentially in compile, runtime, test order.
 */
export async function forEachPurpose(
  fn: (purpose: Purpose) => Promise<string[]>
): Promise<Record<Purpose, string[]>> {
  const compile = await fn('compile');
  const runtime = await fn('runtime');
  const test = await fn('test');
  return { compile, runtime, test };
}
