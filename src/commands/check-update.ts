import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { resolveOutput } from '../core/ports/index.js';
import type { UpdateCheckResult } from '../core/install/orchestrator/types.js';
import type { OutputPort } from '../core/ports/output.js';
import { lookupProject, openRuntime, shortHash, withInterrupt, type TargetOptions } from '../cli/command-helpers.js';

export interface UpdateCommandOptions extends TargetOptions {
  file?: string;
}

export function printUpdateCheck(out: OutputPort, title: string, result: UpdateCheckResult): void {
  if (!result.currentHash) {
    out.info(`${title} is not installed from the registry`);
    return;
  }
  if (!result.hasUpdate) {
    out.success(`${title} is up to date (${result.currentFileName ?? shortHash(result.currentHash)})`);
    return;
  }
  const latest = result.latestRelease ? result.latestRelease.versionNumber : shortHash(result.latestHash ?? '');
  out.info(`${title}: update available ${result.currentFileName ?? shortHash(result.currentHash)} -> ${latest}`);
}

export function setupCheckUpdateCommand(program: Command): void {
  program
    .command('check-update')
    .argument('<project-id>', 'registry project id or slug')
    .description('Check whether a newer compatible release of an installed project exists')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type (defaults to the registry\'s)')
    .option('--file <name>', 'installed file name, when known')
    .action(
      withErrorHandling(async (projectId: string, options: UpdateCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const installation = await runtime.installations.require(options.installation);
        const project = await lookupProject(runtime, projectId, options.type);
        const result = await withInterrupt(signal =>
          runtime.orchestrator.checkForUpdate(
            { ...project, ...(options.file ? { fileName: options.file } : {}) },
            installation,
            signal
          )
        );
        printUpdateCheck(resolveOutput(runtime.context), project.title, result);
      })
    );
}
