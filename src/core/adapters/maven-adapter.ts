/**
 * Maven-style adapter
 *
 * Replays Maven's default classpaths: each purpose is resolved from pom.xml
 * with the scopes Maven itself puts on that classpath.
 */

import { join } from 'path';
import type { ExternalConfig } from '../../types/index.js';
import { MAVEN_PATHS } from '../../constants/index.js';
import { canonicalIfExists, canonicalOrAbsolute } from '../../utils/fs.js';
import { conventionalSourceRoots } from '../probe/index.js';
import { resolveDiagnostics } from '../ports/index.js';
import { scopesFor } from '../scopes/index.js';
import { MavenCommandResolver } from '../resolvers/index.js';
import { createExternalConfig } from './external-config.js';
import { forEachPurpose, resolveDependencySet } from './dependency-sets.js';
import type { BuildSystemAdapter, MavenAdapterOptions } from './types.js';

export async function resolveMavenConfig(baseDir: string, options: MavenAdapterOptions = {}): Promise<ExternalConfig> {
  const root = await canonicalOrAbsolute(baseDir);
  const diagnostics = resolveDiagnostics(options);
  const resolver = options.resolver ?? new MavenCommandResolver({ command: options.mavenCommand });
  const pom = join(root, MAVEN_PATHS.POM);

  const sourceRoots = await conventionalSourceRoots(root);

  const deps = await forEachPurpose(purpose => {
    diagnostics.step('Resolving Maven dependencies...');
    diagnostics.info(`Using conf: ${purpose}`);
    return resolveDependencySet(
      resolver,
      { baseDir: root, descriptor: pom, scopes: scopesFor('maven', purpose) },
      diagnostics,
      'Failed to resolve Maven dependencies.'
    );
  });

  return createExternalConfig({
    sourceRoots,
    compileDepJars: deps.compile,
    runtimeDepJars: deps.runtime,
    testDepJars: deps.test,
    target: await canonicalIfExists(join(root, MAVEN_PATHS.TARGET))
  });
}

export const mavenAdapter: BuildSystemAdapter<'maven'> = {
  kind: 'maven',
  resolve: resolveMavenConfig
};
