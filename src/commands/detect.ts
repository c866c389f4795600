import { Command } from 'commander';

import type { BuildSystem, CommandResult } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveProjectDir } from '../core/execution-context.js';
import { detectBuildSystem } from '../core/detect.js';
import { isDirectory } from '../utils/fs.js';

async function detectCommand(dir: string | undefined, command: Command): Promise<CommandResult<BuildSystem>> {
  const programOpts = command.parent?.opts<{ cwd?: string }>() ?? {};
  const ctx = await createCliExecutionContext({ cwd: programOpts.cwd });
  const projectDir = resolveProjectDir(ctx, dir);

  if (!(await isDirectory(projectDir))) {
    throw new ValidationError(`Project directory does not exist: ${projectDir}`);
  }

  const buildSystem = await detectBuildSystem(projectDir);
  if (!buildSystem) {
    throw new ValidationError(`No supported build system found in ${projectDir}`);
  }

  console.log(buildSystem);
  return { success: true, data: buildSystem };
}

export function setupDetectCommand(program: Command): void {
  program
    .command('detect')
    .argument('[dir]', 'project directory (default: current directory)')
    .description('Print the build system (maven, ivy or sbt) managing a project')
    .action(withErrorHandling(async (dir: string | undefined, _options: unknown, command: Command) => {
      await detectCommand(dir, command);
    }));
}
