import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { resolveOutput } from '../core/ports/index.js';
import { localProjectId } from '../core/installed/scanner.js';
import { openRuntime, packageTypeOption } from '../cli/command-helpers.js';
import type { FileCommandOptions } from './toggle.js';

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .argument('<file-name>', 'installed file, in its enabled or disabled form')
    .description('Delete an installed file')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type', 'mod')
    .option('--project <id>', 'project id the file belongs to')
    .action(
      withErrorHandling(async (fileName: string, options: FileCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const installation = await runtime.installations.require(options.installation);
        const result = await runtime.orchestrator.deleteResource(
          {
            id: options.project ?? localProjectId(fileName),
            title: fileName,
            packageType: packageTypeOption(options.type),
            fileName
          },
          installation
        );
        resolveOutput(runtime.context).success(`Removed ${result.fileName} from ${installation.name}`);
      })
    );
}
