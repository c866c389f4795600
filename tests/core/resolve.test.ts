import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { detectBuildSystem } from '../../src/core/detect.js';
import { resolveExternalConfig, ivyOptionsFrom, mavenOptionsFrom, sbtOptionsFrom } from '../../src/core/resolve.js';
import { ValidationError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir, createTree, writeFile, recordingDiagnostics, stubResolver } from '../test-helpers.js';

describe('detectBuildSystem', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('detect');
    await createTree(root, [
      'both/pom.xml',
      'both/ivy.xml',
      'ivy-only/ivy.xml',
      'sbt-main/project/build.properties',
      'sbt-main/sub/src/main/scala/',
      'nothing/src/main/java/',
      'dir-named-pom/pom.xml/',
    ]);
  });

  after(async () => {
    await removeDir(root);
  });

  it('prefers Maven, then Ivy, then sbt', async () => {
    assert.equal(await detectBuildSystem(path.join(root, 'both')), 'maven');
    assert.equal(await detectBuildSystem(path.join(root, 'ivy-only')), 'ivy');
    assert.equal(await detectBuildSystem(path.join(root, 'sbt-main')), 'sbt');
  });

  it('detects an sbt subproject through its parent', async () => {
    assert.equal(await detectBuildSystem(path.join(root, 'sbt-main/sub')), 'sbt');
  });

  it('detects an sbt subproject reached through a link', async () => {
    const elsewhere = await makeTempDir('detect-elsewhere');
    try {
      await fs.symlink(path.join(root, 'sbt-main/sub'), path.join(elsewhere, 'sub'), 'dir');
      assert.equal(await detectBuildSystem(path.join(elsewhere, 'sub')), 'sbt');
    } finally {
      await removeDir(elsewhere);
    }
  });

  it('requires marker files to be regular files', async () => {
    assert.equal(await detectBuildSystem(path.join(root, 'dir-named-pom')), undefined);
    assert.equal(await detectBuildSystem(path.join(root, 'nothing')), undefined);
  });
});

describe('resolveExternalConfig', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('resolve');
    await createTree(root, [
      'maven-app/pom.xml',
      'maven-app/ivy.xml',
      'maven-app/src/main/java/',
      'maven-app/repo/dep.jar',
      'plain/README.md',
    ]);
  });

  after(async () => {
    await removeDir(root);
  });

  it('detects the build system and runs its adapter', async () => {
    const baseDir = path.join(root, 'maven-app');
    const resolver = stubResolver(() => ({ ok: true, artifacts: [path.join(baseDir, 'repo/dep.jar')] }));

    const project = await resolveExternalConfig(baseDir, {
      settings: {},
      maven: { resolver },
      diagnostics: recordingDiagnostics()
    });

    assert.equal(project.buildSystem, 'maven');
    assert.equal(project.baseDir, baseDir);
    assert.deepEqual(project.config.compileDepJars, [path.join(baseDir, 'repo/dep.jar')]);
    assert.deepEqual(project.config.sourceRoots, [path.join(baseDir, 'src/main/java')]);
    assert.equal(resolver.requests.length, 3);
  });

  it('lets an explicit build system override detection', async () => {
    const baseDir = path.join(root, 'maven-app');
    const resolver = stubResolver(() => ({ ok: true, artifacts: [] }));

    const project = await resolveExternalConfig(baseDir, {
      buildSystem: 'ivy',
      settings: { buildSystem: 'maven', ivy: { testConf: 'testing' } },
      ivy: { resolver },
      diagnostics: recordingDiagnostics()
    });

    assert.equal(project.buildSystem, 'ivy');
    assert.deepEqual(resolver.requests.map(request => request.scopes), [['default'], ['testing']]);
  });

  it('reads the build system from a settings file', async () => {
    const baseDir = path.join(root, 'plain');
    await writeFile(root, 'plain/buildpath.jsonc', '{ "buildSystem": "sbt" }\n');
    const diagnostics = recordingDiagnostics();

    const project = await resolveExternalConfig(baseDir, { diagnostics });

    assert.equal(project.buildSystem, 'sbt');
    assert.deepEqual(diagnostics.messages.map(m => m.message), ['Could not locate build.properties file!']);
  });

  it('rejects a directory with no supported build system', async () => {
    const empty = await makeTempDir('resolve-empty');
    try {
      await assert.rejects(
        resolveExternalConfig(empty, { settings: {} }),
        (error: unknown) => error instanceof ValidationError && error.message.startsWith(
          `Validation error: No supported build system found in ${empty}`
        )
      );
    } finally {
      await removeDir(empty);
    }
  });

  it('rejects a missing directory', async () => {
    const missing = path.join(root, 'missing');
    await assert.rejects(
      resolveExternalConfig(missing),
      { message: `Validation error: Project directory does not exist: ${missing}` }
    );
  });
});

describe('adapter option merging', () => {
  it('lets caller options win over settings', () => {
    const settings = {
      maven: { command: 'mvnw' },
      ivy: { file: 'ivy-settings.xml', compileConf: 'build', jar: '/opt/ivy.jar' },
      sbt: { defaultScalaVersion: '2.9.2' }
    };

    assert.equal(mavenOptionsFrom(settings, {}).mavenCommand, 'mvnw');
    assert.equal(mavenOptionsFrom(settings, { mavenCommand: 'mvn' }).mavenCommand, 'mvn');

    const ivy = ivyOptionsFrom(settings, { compileConf: 'compile-only' });
    assert.equal(ivy.ivyFile, 'ivy-settings.xml');
    assert.equal(ivy.compileConf, 'compile-only');
    assert.equal(ivy.ivyJar, '/opt/ivy.jar');
    assert.equal(ivy.testConf, undefined);

    assert.equal(sbtOptionsFrom(settings).defaultScalaVersion, '2.9.2');
    assert.equal(sbtOptionsFrom({}, { defaultScalaVersion: '2.10.0' }).defaultScalaVersion, '2.10.0');
  });
});
