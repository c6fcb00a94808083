import chalk from 'chalk';

import type { ContextFactory } from '../context.js';
import { renderEvent, withSpinner } from '../render.js';
import { reportError } from '../utils.js';

export interface UpdateOptions {
  version?: string;
}

export async function updateCommand(
  openContext: ContextFactory,
  verbose: boolean,
  name: string,
  options: UpdateOptions,
): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    ctx.events.on('event', renderEvent);
    const target = options.version ?? 'latest';
    const result = await withSpinner(`Updating ${name} to ${target}...`, () => ctx.packages.update(name, options.version));
    if (result.updated) {
      console.log(chalk.green(`Updated ${name} from ${result.previousVersion} to ${result.metadata.version}`));
      console.log(result.metadata.binaryPath);
    } else {
      console.log(chalk.gray(`${name} is already at version ${result.metadata.version}`));
    }
  } catch (error) {
    reportError(error);
  }
}
