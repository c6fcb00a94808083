import type { ContextFactory } from '../context.js';
import { printBlockList } from '../render.js';
import { reportError } from '../utils.js';

export async function listCommand(openContext: ContextFactory, verbose: boolean): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    printBlockList(await ctx.packages.getInstallationStats());
  } catch (error) {
    reportError(error);
  }
}
