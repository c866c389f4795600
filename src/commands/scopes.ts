import { Argument, Command } from 'commander';

import { BUILD_SYSTEMS, PURPOSES, type BuildSystem, type IvyConfs } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { isPurpose, scopesFor } from '../core/scopes/index.js';

interface ScopesOptions {
  conf?: string;
}

export function setupScopesCommand(program: Command): void {
  program
    .command('scopes')
    .addArgument(new Argument('<system>', 'build system').choices([...BUILD_SYSTEMS]))
    .argument('<purpose>', `one of ${PURPOSES.join(', ')}`)
    .option('--conf <conf>', 'Ivy configuration configured for the purpose')
    .description('Print the configuration scopes a build system uses for a classpath')
    .action(withErrorHandling(async (system: BuildSystem, purpose: string, options: ScopesOptions) => {
      if (!isPurpose(purpose)) {
        throw new ValidationError(`purpose must be one of ${PURPOSES.join(', ')}, got '${purpose}'`);
      }
      const ivyConfs: IvyConfs = {};
      if (options.conf) {
        ivyConfs[purpose] = options.conf;
      }
      console.log(scopesFor(system, purpose, ivyConfs).join(','));
    }));
}
