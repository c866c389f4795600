/**
 * Ivy-style adapter
 *
 * The 'default' configuration is always resolved; a purpose with its own
 * configuration name gets a resolution of that configuration, every other
 * purpose reuses the default set.
 */

import { resolve } from 'path';
import type { ExternalConfig, IvyConfs, Purpose } from '../../types/index.js';
import { IVY_DEFAULT_CONF } from '../../constants/index.js';
import { canonicalOrAbsolute } from '../../utils/fs.js';
import { conventionalSourceRoots } from '../probe/index.js';
import { resolveDiagnostics } from '../ports/index.js';
import { scopesFor } from '../scopes/index.js';
import { IvyCommandResolver } from '../resolvers/index.js';
import { createExternalConfig } from './external-config.js';
import { forEachPurpose, resolveDependencySet } from './dependency-sets.js';
import type { BuildSystemAdapter, IvyAdapterOptions } from './types.js';

export async function resolveIvyConfig(baseDir: string, options: IvyAdapterOptions = {}): Promise<ExternalConfig> {
  const root = await canonicalOrAbsolute(baseDir);
  const diagnostics = resolveDiagnostics(options);
  const resolver = options.resolver ?? new IvyCommandResolver({
    ivyJar: options.ivyJar,
    javaCommand: options.javaCommand
  });
  const ivyFile = options.ivyFile !== undefined ? resolve(root, options.ivyFile) : undefined;
  const confs: IvyConfs = {
    compile: options.compileConf,
    runtime: options.runtimeConf,
    test: options.testConf
  };

  const sourceRoots = await conventionalSourceRoots(root);

  const resolveConf = (conf: string): Promise<string[]> => {
    diagnostics.step('Resolving Ivy dependencies...');
    if (ivyFile) {
      diagnostics.info(`Using ivy file '${ivyFile}'.`);
    }
    diagnostics.info(`Using config '${conf}'.`);
    return resolveDependencySet(
      resolver,
      { baseDir: root, descriptor: ivyFile, scopes: [conf] },
      diagnostics,
      'Failed to resolve Ivy dependencies.'
    );
  };

  const defaultDeps = await resolveConf(IVY_DEFAULT_CONF);
  const deps = await forEachPurpose((purpose: Purpose) => {
    if (confs[purpose] === undefined) {
      return Promise.resolve(defaultDeps);
    }
    const [conf] = scopesFor('ivy', purpose, confs);
    return resolveConf(conf);
  });

  return createExternalConfig({
    sourceRoots,
    compileDepJars: deps.compile,
    runtimeDepJars: deps.runtime,
    testDepJars: deps.test
  });
}

export const ivyAdapter: BuildSystemAdapter<'ivy'> = {
  kind: 'ivy',
  resolve: resolveIvyConfig
};
