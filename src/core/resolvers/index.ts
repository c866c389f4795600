/**
 * External dependency resolvers
 *
 * - types.ts: collaborator contract (DependencyResolver, ResolutionRequest)
 * - maven-command-resolver.ts: mvn dependency:list
 * - ivy-command-resolver.ts: java -jar ivy.jar -cachepath
 */

export type { DependencyResolver, ResolutionRequest, ResolutionResult } from './types.js';
export { resolved, failed } from './types.js';
export {
  MavenCommandResolver,
  parseDependencyList,
  parseDependencyListLine,
  type MavenArtifact,
  type MavenCommandResolverOptions
} from './maven-command-resolver.js';
export { IvyCommandResolver, parseCachePath, type IvyCommandResolverOptions } from './ivy-command-resolver.js';
