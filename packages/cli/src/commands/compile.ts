import chalk from 'chalk';

import type { ContextFactory } from '../context.js';
import { renderEvent } from '../render.js';
import { reportError } from '../utils.js';

export async function compileCommand(openContext: ContextFactory, verbose: boolean, manifest: string): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    ctx.events.on('event', renderEvent);
    const compiled = await ctx.workflows.compileWorkflow(manifest);

    console.log(chalk.bold('\nBlocks'));
    for (const name of compiled.graph.vertexNames()) {
      const meta = compiled.metadata.get(name);
      console.log(`  ${name}${meta ? chalk.gray(` (${meta.version})`) : ''}`);
    }
    console.log(chalk.bold('\nEdges'));
    const edges = compiled.graph.edges();
    if (edges.length === 0) console.log(chalk.gray('  (none)'));
    for (const edge of edges) {
      console.log(`  ${edge.source} -> ${edge.target} ${chalk.gray(`[${edge.attributes.output}]`)}`);
    }
    console.log(`\nRoots:         ${compiled.roots.join(', ') || '(none)'}`);
    console.log(`Final outputs: ${compiled.finalOutputs.join(', ') || '(none)'}`);
  } catch (error) {
    reportError(error);
  }
}
