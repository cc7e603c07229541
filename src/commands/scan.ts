import { Command } from 'commander';
import pc from 'picocolors';

import { withErrorHandling } from '../utils/errors.js';
import { requireInstallable } from '../core/package-types.js';
import { resolveOutput } from '../core/ports/index.js';
import { openRuntime, packageTypeOption, shortHash, withInterrupt, type TargetOptions } from '../cli/command-helpers.js';

export function setupScanCommand(program: Command): void {
  program
    .command('scan')
    .description('List the content installed in an installation')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type', 'mod')
    .action(
      withErrorHandling(async (options: TargetOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const out = resolveOutput(runtime.context);
        const installation = await runtime.installations.require(options.installation);
        const packageType = requireInstallable(packageTypeOption(options.type), 'scan');

        const index = runtime.indexes.get(installation, packageType);
        const entries = await withInterrupt(signal => index.refresh(signal));

        if (entries.length === 0) {
          out.info(`No ${packageType} content in ${installation.name}`);
          return;
        }

        out.info(`${entries.length} ${packageType} entr${entries.length === 1 ? 'y' : 'ies'} in ${installation.name}:`);
        const sorted = [...entries].sort((a, b) => a.fileName.localeCompare(b.fileName));
        for (const entry of sorted) {
          const name = entry.disabled ? pc.dim(`${entry.fileName} (disabled)`) : entry.fileName;
          out.message(`  ${name}  ${pc.cyan(entry.projectId ?? '?')}  ${pc.dim(shortHash(entry.hash))}`);
        }
      })
    );
}
