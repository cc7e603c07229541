#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { DEFAULTS } from './constants/index.js';
import { setupInstallCommand } from './commands/install.js';
import { setupDepsCommand } from './commands/deps.js';
import { setupCompatibleCommand } from './commands/compatible.js';
import { setupScanCommand } from './commands/scan.js';
import { setupCheckUpdateCommand } from './commands/check-update.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupToggleCommand } from './commands/toggle.js';
import { setupRemoveCommand } from './commands/remove.js';

/**
 * craftpkg: installs mods, datapacks, shaders and resource packs into game
 * installations together with their missing dependencies, and keeps track
 * of what is already there.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('craftpkg')
    .description('mod and resource installer for game installations')
    .version(DEFAULTS.VERSION)
    .option('--verbose', 'print debug logging to stderr')
    .option('--interactive', 'also ask which release of each dependency to install')
    .configureHelp({ sortSubcommands: true });

  for (const setup of [
    setupInstallCommand,
    setupDepsCommand,
    setupCompatibleCommand,
    setupScanCommand,
    setupCheckUpdateCommand,
    setupUpdateCommand,
    setupToggleCommand,
    setupRemoveCommand
  ]) {
    setup(program);
  }

  program.hook('preAction', () => {
    if (program.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

  return program;
}

function fail(label: string, error: unknown): never {
  logger.error(label, { error });
  console.error('✗ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

const entry = process.argv[1] ?? '';
if (['index.js', 'index.ts', 'craftpkg'].some(name => entry.endsWith(name))) {
  process.on('uncaughtException', error => fail('Uncaught exception', error));
  process.on('unhandledRejection', reason => fail('Unhandled promise rejection', reason));
  run().catch((error: unknown) => fail('Command failed', error));
}
