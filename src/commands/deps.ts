import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { displayMissingDependencies } from '../core/dependency-resolver/display.js';
import { resolveOutput } from '../core/ports/index.js';
import { openRuntime, withInterrupt, type TargetOptions } from '../cli/command-helpers.js';

export function setupDepsCommand(program: Command): void {
  program
    .command('deps')
    .argument('<project-id>', 'registry project id or slug')
    .description('Show the dependencies of a project that an installation is missing')
    .requiredOption('-i, --installation <name>', 'target installation')
    .action(
      withErrorHandling(async (projectId: string, options: TargetOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const installation = await runtime.installations.require(options.installation);
        const result = await withInterrupt(signal =>
          runtime.resolver.resolveMissingDependencies(projectId, installation, { signal })
        );
        displayMissingDependencies(result, resolveOutput(runtime.context));
      })
    );
}
