import type { ExecutionMode } from '@blockflow/core';

import type { ContextFactory } from '../context.js';
import { printRunSummary, renderEvent } from '../render.js';
import { reportError } from '../utils.js';

export interface RunCommandOptions {
  mode?: ExecutionMode;
  maxParallel?: number;
  printResults?: boolean;
}

export async function runCommand(
  openContext: ContextFactory,
  verbose: boolean,
  manifest: string,
  options: RunCommandOptions,
): Promise<void> {
  try {
    const ctx = await openContext({
      verbose,
      overrides: { execution: { mode: options.mode, maxParallel: options.maxParallel } },
    });
    ctx.events.on('event', renderEvent);

    const compiled = await ctx.workflows.compileWorkflow(manifest);
    ctx.logger.debug(`running ${compiled.name} from ${manifest} (${ctx.config.execution.mode})`);
    const summary = await ctx.workflows.runWorkflow(compiled.name);
    printRunSummary(summary, compiled.finalOutputs, options.printResults ?? false);
  } catch (error) {
    reportError(error);
  }
}
