/**
 * Tests for ExecutionContext module
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

import { createExecutionContext, resolveProjectDir, resolveArgumentPath } from '../../src/core/execution-context.js';
import { createCliExecutionContext, detectInteractive } from '../../src/cli/context.js';
import { silentDiagnostics } from '../../src/core/ports/index.js';
import { ValidationError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir } from '../test-helpers.js';

describe('ExecutionContext', () => {
  let testDir: string;
  let originalCwd: string;

  beforeEach(async () => {
    originalCwd = process.cwd();
    testDir = await makeTempDir('context');
    process.chdir(testDir);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    await removeDir(testDir);
  });

  describe('createExecutionContext', () => {
    it('targets the current directory without --cwd', async () => {
      const context = await createExecutionContext({});
      assert.equal(context.sourceCwd, testDir);
      assert.equal(context.targetDir, testDir);
      assert.equal(context.diagnostics, undefined);
    });

    it('resolves --cwd against the current directory', async () => {
      await mkdir(join(testDir, 'app'));
      const context = await createExecutionContext({ cwd: 'app' });
      assert.equal(context.sourceCwd, testDir);
      assert.equal(context.targetDir, join(testDir, 'app'));
    });

    it('rejects a missing target directory', async () => {
      await assert.rejects(createExecutionContext({ cwd: 'missing' }), (error: unknown) =>
        error instanceof ValidationError &&
        error.message.startsWith(`Validation error: Target directory does not exist: ${join(testDir, 'missing')}`)
      );
    });

    it('rejects a target that is a file', async () => {
      await writeFile(join(testDir, 'pom.xml'), '<project/>\n');
      await assert.rejects(
        createExecutionContext({ cwd: 'pom.xml' }),
        { message: `Validation error: Target path is not a directory: ${join(testDir, 'pom.xml')}` }
      );
    });
  });

  describe('resolveProjectDir', () => {
    it('takes a relative project argument from the target directory', async () => {
      await mkdir(join(testDir, 'app'));
      const context = await createExecutionContext({ cwd: 'app' });
      assert.equal(resolveProjectDir(context), join(testDir, 'app'));
      assert.equal(resolveProjectDir(context, 'module'), join(testDir, 'app', 'module'));
      assert.equal(resolveProjectDir(context, '/abs/project'), '/abs/project');
    });
  });

  describe('resolveArgumentPath', () => {
    it('takes a path option from the target directory, not the project', async () => {
      await mkdir(join(testDir, 'app'));
      const context = await createExecutionContext({ cwd: 'app' });
      assert.equal(resolveArgumentPath(context, 'sub/ivy.xml'), join(testDir, 'app', 'sub', 'ivy.xml'));
      assert.equal(resolveArgumentPath(context, '/abs/ivy.xml'), '/abs/ivy.xml');
    });
  });

  describe('createCliExecutionContext', () => {
    it('installs the silent sink for --quiet', async () => {
      const context = await createCliExecutionContext({ quiet: true });
      assert.equal(context.diagnostics, silentDiagnostics);
    });

    it('installs a sink otherwise', async () => {
      const context = await createCliExecutionContext({ interactive: false });
      assert.ok(context.diagnostics);
      assert.notEqual(context.diagnostics, silentDiagnostics);
    });
  });

  describe('detectInteractive', () => {
    it('honors an explicit override', () => {
      assert.equal(detectInteractive(true), true);
      assert.equal(detectInteractive(false), false);
    });
  });
});
