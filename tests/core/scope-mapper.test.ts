import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { scopesFor, assertPurpose, isPurpose } from '../../src/core/scopes/index.js';
import { UnsupportedPurposeError } from '../../src/utils/errors.js';
import type { BuildSystem, Purpose } from '../../src/types/index.js';

const EXPECTED: Array<[BuildSystem, Purpose, string[]]> = [
  ['maven', 'compile', ['compile', 'provided', 'system', 'test']],
  ['maven', 'runtime', ['compile', 'provided', 'system', 'runtime']],
  ['maven', 'test', ['compile', 'provided', 'system', 'runtime', 'test']],
  ['sbt', 'compile', ['compile', 'default', 'provided', 'optional', 'test']],
  ['sbt', 'runtime', ['compile', 'default', 'provided', 'optional', 'runtime']],
  ['sbt', 'test', ['compile', 'default', 'provided', 'optional', 'runtime', 'test']],
  ['ivy', 'compile', ['default']],
  ['ivy', 'runtime', ['default']],
  ['ivy', 'test', ['default']],
];

describe('scopesFor', () => {
  for (const [system, purpose, scopes] of EXPECTED) {
    it(`maps ${system}/${purpose} to ${scopes.join(',')}`, () => {
      assert.deepEqual(scopesFor(system, purpose), scopes);
    });
  }

  it('maps an Ivy purpose to its configured configuration', () => {
    const confs = { compile: 'build', test: 'testing' };
    assert.deepEqual(scopesFor('ivy', 'compile', confs), ['build']);
    assert.deepEqual(scopesFor('ivy', 'test', confs), ['testing']);
  });

  it('falls back to default for an Ivy purpose without a configuration', () => {
    assert.deepEqual(scopesFor('ivy', 'runtime', { compile: 'build' }), ['default']);
  });

  it('fails fast on a purpose outside compile/runtime/test', () => {
    const bogus: unknown = 'provided';
    assert.throws(
      () => scopesFor('maven', assertPurpose(bogus)),
      (error: unknown) =>
        error instanceof UnsupportedPurposeError &&
        error.code === 'UNSUPPORTED_PURPOSE' &&
        error.message === "Unsupported dependency purpose 'provided' (expected compile, runtime or test)"
    );
  });
});

describe('isPurpose', () => {
  it('accepts the three purposes only', () => {
    assert.equal(isPurpose('compile'), true);
    assert.equal(isPurpose('runtime'), true);
    assert.equal(isPurpose('test'), true);
    assert.equal(isPurpose('Compile'), false);
    assert.equal(isPurpose(undefined), false);
    assert.equal(isPurpose(3), false);
  });
});
