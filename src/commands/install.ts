import { Command } from 'commander';
import pc from 'picocolors';

import { withErrorHandling } from '../utils/errors.js';
import { displayMissingDependencies } from '../core/dependency-resolver/display.js';
import { resolveOutput } from '../core/ports/index.js';
import { lookupProject, openRuntime, parsePolicy, withInterrupt, type TargetOptions } from '../cli/command-helpers.js';

interface InstallCommandOptions extends TargetOptions {
  release?: string;
  policy?: string;
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .argument('<project-id>', 'registry project id or slug')
    .description('Install a project and its missing dependencies into an installation')
    .requiredOption('-i, --installation <name>', 'target installation')
    .option('-t, --type <type>', 'package type (defaults to the registry\'s)')
    .option('--release <id>', 'release id or version number to install')
    .option('--policy <policy>', 'dependency policy: auto, manual or main-only')
    .action(
      withErrorHandling(async (projectId: string, options: InstallCommandOptions, command: Command) => {
        const runtime = await openRuntime(command);
        const out = resolveOutput(runtime.context);
        const installation = await runtime.installations.require(options.installation);
        const project = await lookupProject(runtime, projectId, options.type);
        const policy = options.policy ? parsePolicy(options.policy) : undefined;

        const outcome = await withInterrupt(signal =>
          runtime.orchestrator.install(project, installation, {
            signal,
            ...(policy ? { policy } : {}),
            ...(options.release ? { versionId: options.release } : {})
          })
        );

        switch (outcome.status) {
          case 'installed': {
            out.success(`${project.title} installed into ${installation.name} (${outcome.file.fileName})`);
            if (outcome.dependencies.length > 0) {
              out.info(`${outcome.dependencies.length} dependenc${outcome.dependencies.length === 1 ? 'y' : 'ies'} installed`);
            }
            if (outcome.skippedDependencies.length > 0) {
              out.warn(`Skipped dependencies: ${outcome.skippedDependencies.join(', ')}`);
            }
            return;
          }
          case 'cancelled':
            out.info('Install cancelled');
            return;
          case 'awaiting-confirmation': {
            const { resolution } = outcome;
            displayMissingDependencies(
              {
                root: resolution.root,
                missing: resolution.missing.map(detail => ({
                  detail,
                  releases: resolution.releases.get(detail.id) ?? []
                })),
                unresolved: resolution.unresolved
              },
              out
            );
            runtime.orchestrator.cancel(resolution);
            out.warn(
              `Nothing installed. Re-run with ${pc.bold('--policy auto')} to install the dependencies, ` +
              `${pc.bold('--policy main-only')} to skip them, or ${pc.bold('--interactive')} to choose.`
            );
            process.exitCode = 1;
            return;
          }
        }
      })
    );
}
