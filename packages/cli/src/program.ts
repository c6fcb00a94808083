import { Command, InvalidArgumentError, Option } from 'commander';

import { VERSION } from '@blockflow/core';

import { compileCommand } from './commands/compile.js';
import { infoCommand } from './commands/info.js';
import { installCommand } from './commands/install.js';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import { uninstallCommand } from './commands/uninstall.js';
import { updateCommand } from './commands/update.js';
import type { ContextFactory } from './context.js';
import { openContext as defaultOpenContext } from './context.js';
import { parsePositiveInt } from './utils.js';

function positiveInt(value: string): number {
  try {
    return parsePositiveInt(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export function createProgram(openContext: ContextFactory = defaultOpenContext): Command {
  const program = new Command();
  const verbose = (): boolean => program.opts<{ verbose?: boolean }>().verbose === true;

  program
    .name('blockflow')
    .description('Compile and run workflows of CLI blocks installed from GitHub releases')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging')
    .enablePositionalOptions();

  program
    .command('install')
    .description('Install a block from a GitHub repository release')
    .argument('<repo>', 'Repository in owner/repo form')
    .option('--version <tag>', 'Release tag (default: latest release)')
    .option('--force', 'Reinstall even if already installed', false)
    .action((repo: string, options: { version?: string; force?: boolean }) =>
      installCommand(openContext, verbose(), repo, options),
    );

  program
    .command('uninstall')
    .description('Remove an installed block')
    .argument('<name>', 'Block name')
    .action((name: string) => uninstallCommand(openContext, verbose(), name));

  program
    .command('update')
    .description('Move an installed block to another release')
    .argument('<name>', 'Block name')
    .option('--version <tag>', 'Release tag (default: latest release)')
    .action((name: string, options: { version?: string }) => updateCommand(openContext, verbose(), name, options));

  program
    .command('list')
    .description('List installed blocks')
    .action(() => listCommand(openContext, verbose()));

  program
    .command('info')
    .description('Show an installed block and its entries')
    .argument('<name>', 'Block name')
    .action((name: string) => infoCommand(openContext, verbose(), name));

  program
    .command('compile')
    .description('Install the blocks of a workflow and print its graph')
    .argument('<manifest>', 'Workflow YAML file')
    .action((manifest: string) => compileCommand(openContext, verbose(), manifest));

  program
    .command('run')
    .description('Compile and run a workflow')
    .argument('<manifest>', 'Workflow YAML file')
    .addOption(new Option('--mode <mode>', 'Scheduling mode').choices(['sequential', 'dataflow']))
    .option('--max-parallel <n>', 'Concurrent blocks in dataflow mode', positiveInt)
    .option('--print-results', 'Print the final outputs', false)
    .action((manifest: string, options: { mode?: 'sequential' | 'dataflow'; maxParallel?: number; printResults?: boolean }) =>
      runCommand(openContext, verbose(), manifest, options),
    );

  return program;
}
