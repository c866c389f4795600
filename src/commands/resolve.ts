import { Command, Option } from 'commander';

import { BUILD_SYSTEMS, PURPOSES, type BuildSystem, type CommandResult, type ResolvedProject } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveArgumentPath, resolveProjectDir } from '../core/execution-context.js';
import { resolveExternalConfig } from '../core/resolve.js';
import { isPurpose } from '../core/scopes/index.js';
import { formatClasspath, formatResolvedProject, toJsonDocument } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

interface ResolveOptions {
  system?: BuildSystem;
  ivyFile?: string;
  compileConf?: string;
  runtimeConf?: string;
  testConf?: string;
  scalaVersion?: string;
  json?: boolean;
  classpath?: string;
  quiet?: boolean;
}

function selectJars(project: ResolvedProject, purpose: string): readonly string[] {
  if (!isPurpose(purpose)) {
    throw new ValidationError(`--classpath expects one of ${PURPOSES.join(', ')}, got '${purpose}'`);
  }
  switch (purpose) {
    case 'compile':
      return project.config.compileDepJars;
    case 'runtime':
      return project.config.runtimeDepJars;
    case 'test':
      return project.config.testDepJars;
  }
}

async function resolveCommand(
  dir: string | undefined,
  options: ResolveOptions,
  command: Command
): Promise<CommandResult<ResolvedProject>> {
  const programOpts = command.parent?.opts<{ cwd?: string }>() ?? {};
  if (options.json && options.classpath) {
    throw new ValidationError('Cannot use --json with --classpath; choose one output format.');
  }

  const ctx = await createCliExecutionContext({ cwd: programOpts.cwd, quiet: options.quiet });
  const projectDir = resolveProjectDir(ctx, dir);
  logger.debug(`Resolving project at ${projectDir}`);

  const project = await resolveExternalConfig(projectDir, {
    buildSystem: options.system,
    diagnostics: ctx.diagnostics,
    ivy: {
      ivyFile: options.ivyFile !== undefined ? resolveArgumentPath(ctx, options.ivyFile) : undefined,
      compileConf: options.compileConf,
      runtimeConf: options.runtimeConf,
      testConf: options.testConf
    },
    sbt: {
      defaultScalaVersion: options.scalaVersion
    }
  });

  if (options.classpath) {
    console.log(formatClasspath(selectJars(project, options.classpath)));
  } else if (options.json) {
    console.log(JSON.stringify(toJsonDocument(project), null, 2));
  } else {
    console.log(formatResolvedProject(project));
  }

  return { success: true, data: project };
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .argument('[dir]', 'project directory (default: current directory)')
    .description('Resolve source roots, compile/runtime/test jars and the output directory of a JVM project')
    .addOption(new Option('--system <system>', 'build system to use instead of detecting it').choices([...BUILD_SYSTEMS]))
    .option('--ivy-file <file>', 'ivy descriptor to resolve (Ivy projects)')
    .option('--compile-conf <conf>', 'Ivy configuration for the compile classpath')
    .option('--runtime-conf <conf>', 'Ivy configuration for the runtime classpath')
    .option('--test-conf <conf>', 'Ivy configuration for the test classpath')
    .option('--scala-version <version>', 'Scala version assumed when build.properties names none (sbt projects)')
    .option('--json', 'print the result as JSON')
    .option('--classpath <purpose>', 'print only the classpath for compile, runtime or test')
    .option('-q, --quiet', 'suppress progress and failure diagnostics')
    .action(withErrorHandling(async (dir: string | undefined, options: ResolveOptions, command: Command) => {
      await resolveCommand(dir, options, command);
    }));
}
