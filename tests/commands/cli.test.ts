import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { makeTempDir, removeDir, createTree, writeFile, runCli } from '../test-helpers.js';

describe('buildpath CLI', () => {
  let workspace: string;

  before(async () => {
    workspace = await makeTempDir('cli');
    await createTree(workspace, [
      'maven-app/pom.xml',
      'sbt-app/src/main/scala/',
      'sbt-app/lib/local.jar',
      'sbt-app/lib_managed/scala_2.9.1/test/testing.jar',
      'sbt-app/target/scala_2.9.1/classes/',
      'empty/',
    ]);
    await writeFile(workspace, 'sbt-app/project/build.properties', 'project.name=cli-demo\nbuild.scala.versions=2.9.1\n');
  });

  after(async () => {
    await removeDir(workspace);
  });

  it('prints the version from package.json', () => {
    const result = runCli(['--version'], workspace);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, '0.3.0');
  });

  describe('scopes', () => {
    it('prints the Maven scopes of a purpose', () => {
      const result = runCli(['scopes', 'maven', 'test'], workspace);
      assert.equal(result.code, 0);
      assert.equal(result.stdout, 'compile,provided,system,runtime,test');
    });

    it('prints a configured Ivy configuration', () => {
      const result = runCli(['scopes', 'ivy', 'compile', '--conf', 'build'], workspace);
      assert.equal(result.code, 0);
      assert.equal(result.stdout, 'build');
    });

    it('rejects an unknown purpose', () => {
      const result = runCli(['scopes', 'sbt', 'provided'], workspace);
      assert.equal(result.code, 1);
      assert.equal(result.stdout, '');
      assert.ok(
        result.stderr.split('\n').includes(
          "Validation error: purpose must be one of compile, runtime, test, got 'provided'"
        )
      );
    });
  });

  describe('detect', () => {
    it('prints the build system of a directory relative to --cwd', () => {
      const result = runCli(['detect', 'maven-app'], workspace);
      assert.equal(result.code, 0);
      assert.equal(result.stdout, 'maven');
    });

    it('fails when no build system is found', () => {
      const result = runCli(['detect'], path.join(workspace, 'empty'));
      assert.equal(result.code, 1);
      assert.ok(
        result.stderr.split('\n').includes(
          `Validation error: No supported build system found in ${path.join(workspace, 'empty')}`
        )
      );
    });
  });

  describe('resolve', () => {
    it('prints the resolved project as JSON', () => {
      const result = runCli(['resolve', 'sbt-app', '--json'], workspace);
      assert.equal(result.code, 0);

      const appDir = path.join(workspace, 'sbt-app');
      assert.deepEqual(JSON.parse(result.stdout), {
        buildSystem: 'sbt',
        baseDir: appDir,
        projectName: 'cli-demo',
        sourceRoots: [path.join(appDir, 'src/main/scala')],
        compileDepJars: [path.join(appDir, 'lib/local.jar'), path.join(appDir, 'lib_managed/scala_2.9.1/test/testing.jar')],
        runtimeDepJars: [path.join(appDir, 'lib/local.jar')],
        testDepJars: [path.join(appDir, 'lib/local.jar'), path.join(appDir, 'lib_managed/scala_2.9.1/test/testing.jar')],
        target: path.join(appDir, 'target/scala_2.9.1/classes')
      });
      assert.ok(result.stderr.split('\n').includes('Resolving sbt dependencies...'));
    });

    it('prints one classpath', () => {
      const result = runCli(['resolve', 'sbt-app', '--classpath', 'runtime', '--quiet'], workspace);
      assert.equal(result.code, 0);
      assert.equal(result.stdout, path.join(workspace, 'sbt-app/lib/local.jar'));
      assert.equal(result.stderr, '');
    });

    it('rejects --json together with --classpath', () => {
      const result = runCli(['resolve', 'sbt-app', '--json', '--classpath', 'test'], workspace);
      assert.equal(result.code, 1);
      assert.equal(result.stdout, '');
      assert.ok(
        result.stderr.split('\n').includes(
          'Validation error: Cannot use --json with --classpath; choose one output format.'
        )
      );
    });

    it('rejects an unknown --system', () => {
      const result = runCli(['resolve', 'sbt-app', '--system', 'gradle'], workspace);
      assert.notEqual(result.code, 0);
      assert.match(result.stderr, /Allowed choices are maven, ivy, sbt/);
    });
  });
});
