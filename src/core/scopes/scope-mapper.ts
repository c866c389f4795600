/**
 * Scope Mapper
 *
 * Maps a dependency purpose to the configuration scopes a build system
 * consults to satisfy it, replaying each tool's default classpaths.
 */

import { PURPOSES, type BuildSystem, type IvyConfs, type Purpose } from '../../types/index.js';
import { IVY_DEFAULT_CONF } from '../../constants/index.js';
import { UnsupportedPurposeError } from '../../utils/errors.js';

const MAVEN_SCOPES: Readonly<Record<Purpose, readonly string[]>> = {
  compile: ['compile', 'provided', 'system', 'test'],
  runtime: ['compile', 'provided', 'system', 'runtime'],
  test: ['compile', 'provided', 'system', 'runtime', 'test'],
};

// 'test' is part of the compile classpath so test sources can be analyzed too
const SBT_SCOPES: Readonly<Record<Purpose, readonly string[]>> = {
  compile: ['compile', 'default', 'provided', 'optional', 'test'],
  runtime: ['compile', 'default', 'provided', 'optional', 'runtime'],
  test: ['compile', 'default', 'provided', 'optional', 'runtime', 'test'],
};

export function isPurpose(value: unknown): value is Purpose {
  return typeof value === 'string' && PURPOSES.some(purpose => purpose === value);
}

/**
 * Narrow an untrusted value to a Purpose, failing fast otherwise.
 */
export function assertPurpose(value: unknown): Purpose {
  if (!isPurpose(value)) {
    throw new UnsupportedPurposeError(value);
  }
  return value;
}

/**
 * Ordered scope names `buildSystem` uses for `purpose`.
 *
 * For Ivy the purpose maps to the configuration named in `ivyConfs`, or to
 * 'default' when none was configured.
 *
 * @throws UnsupportedPurposeError when `purpose` is not compile, runtime or test
 */
export function scopesFor(buildSystem: BuildSystem, purpose: Purpose, ivyConfs: IvyConfs = {}): readonly string[] {
  assertPurpose(purpose);

  switch (buildSystem) {
    case 'maven':
      return MAVEN_SCOPES[purpose];
    case 'sbt':
      return SBT_SCOPES[purpose];
    case 'ivy':
      return [ivyConfs[purpose] ?? IVY_DEFAULT_CONF];
  }
}
