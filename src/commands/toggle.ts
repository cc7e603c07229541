import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { resolveOutput } from '../core/ports/index.js';
import { isDisabledName } from '../core/resources/disable-toggle.js';
import { localProjectId } from '../core/installed/scanner.js';
import { openRuntime, packageTypeOption, type TargetOptions } from '../cli/command-helpers.js';

export interface FileCommandOptions extends TargetOptions {
  project?: string;
}

export function setupToggleCommand(program: Command): void {
  program
    .command('toggle')
    .argument('<file-name>', 'installed file, in its enabled or disabled form')
    .description('Enable or disable an installed file')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type', 'mod')
    .option('--project <id>', 'project id the file belongs to')
    .action(
      withErrorHandling(async (fileName: string, options: FileCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const installation = await runtime.installations.require(options.installation);
        const project = {
          id: options.project ?? localProjectId(fileName),
          title: fileName,
          packageType: packageTypeOption(options.type),
          fileName
        };

        const next = await runtime.orchestrator.toggleDisabled(project, installation);
        resolveOutput(runtime.context).success(`${isDisabledName(next) ? 'Disabled' : 'Enabled'}: ${next}`);
      })
    );
}

