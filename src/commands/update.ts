import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { resolveOutput } from '../core/ports/index.js';
import { lookupProject, openRuntime, withInterrupt } from '../cli/command-helpers.js';
import { printUpdateCheck, type UpdateCommandOptions } from './check-update.js';

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .argument('<project-id>', 'registry project id or slug')
    .description('Replace an installed project with its latest compatible release')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type (defaults to the registry\'s)')
    .option('--file <name>', 'installed file name, when known')
    .action(
      withErrorHandling(async (projectId: string, options: UpdateCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const out = resolveOutput(runtime.context);
        const installation = await runtime.installations.require(options.installation);
        const project = await lookupProject(runtime, projectId, options.type);
        const target = { ...project, ...(options.file ? { fileName: options.file } : {}) };

        const spinner = out.spinner();
        spinner.start(`Updating ${project.title}`);
        try {
          const result = await withInterrupt(signal => runtime.orchestrator.performUpdate(target, installation, signal));
          spinner.stop();
          printUpdateCheck(out, project.title, result);
        } catch (error) {
          spinner.stop(`Update of ${project.title} failed`);
          throw error;
        }
      })
    );
}
