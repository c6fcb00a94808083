import chalk from 'chalk';

import type { ContextFactory } from '../context.js';
import { reportError } from '../utils.js';

export async function uninstallCommand(openContext: ContextFactory, verbose: boolean, name: string): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    await ctx.packages.uninstall(name);
    console.log(chalk.green(`Uninstalled ${name}`));
  } catch (error) {
    reportError(error);
  }
}
