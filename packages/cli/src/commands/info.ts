import { PackageError } from '@blockflow/core';

import type { ContextFactory } from '../context.js';
import { printBlockInfo } from '../render.js';
import { reportError } from '../utils.js';

export async function infoCommand(openContext: ContextFactory, verbose: boolean, name: string): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    const block = ctx.packages.getLoadedBlock(name);
    if (!block) {
      throw new PackageError(`block '${name}' is not installed`);
    }
    printBlockInfo(block);
  } catch (error) {
    reportError(error);
  }
}
