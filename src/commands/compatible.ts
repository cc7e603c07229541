import { Command } from 'commander';
import pc from 'picocolors';

import { withErrorHandling, ResourceNotFoundError } from '../utils/errors.js';
import { filterCompatibleInstallations } from '../core/compatibility/compatibility-filter.js';
import { resolveOutput } from '../core/ports/index.js';
import { openRuntime, packageTypeOption } from '../cli/command-helpers.js';

interface CompatibleCommandOptions {
  type?: string;
}

export function setupCompatibleCommand(program: Command): void {
  program
    .command('compatible')
    .argument('<project-id>', 'registry project id or slug')
    .description('List the installations a project can be installed into')
    .option('-t, --type <type>', 'package type (defaults to the registry\'s)')
    .action(
      withErrorHandling(async (projectId: string, options: CompatibleCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const out = resolveOutput(runtime.context);
        const detail = await runtime.registry.fetchProjectDetail(projectId);
        if (!detail) {
          throw new ResourceNotFoundError(`project '${projectId}'`);
        }

        const packageType = packageTypeOption(options.type, detail.packageType);
        const project = { id: detail.id, title: detail.title, packageType };
        const installations = await runtime.installations.list();
        const compatible = await filterCompatibleInstallations(detail, installations, packageType, installation =>
          runtime.orchestrator.isInstalled(project, installation)
        );

        if (compatible.length === 0) {
          out.warn(`No installation can take ${detail.title} (${packageType})`);
          return;
        }

        out.info(`${detail.title} (${packageType}) can be installed into:`);
        for (const installation of compatible) {
          out.message(
            `  ${pc.bold(installation.name)} ${pc.dim(`${installation.gameVersion} ${installation.loader}`)}`
          );
        }
      })
    );
}
