// packages/core/src/engine/graph-builder.ts

import type { BlockSpec, Connection } from '../types/workflow.js';
import { WorkflowGraph } from './graph.js';

/**
 * Build the data-flow graph of a workflow.
 *
 * One vertex per block. For every pair of connections where the consumer
 * declares an input and a producer's output carries the same label, an edge
 * runs from the producer's block to the consumer's block. Root connections
 * (no input) add no incoming edge. Fan-in and fan-out fall out of the
 * pairwise match; a block feeding itself yields a self-edge.
 */
export function buildGraph(blocks: BlockSpec[], connections: Connection[]): WorkflowGraph {
  const graph = new WorkflowGraph();

  for (const block of blocks) {
    graph.addVertex(block);
  }

  for (const connection of connections) {
    graph.attachConnection(connection);
  }

  for (const producer of connections) {
    if (producer.output === '') continue;
    for (const consumer of connections) {
      if (consumer.input === '' || producer.output !== consumer.input) continue;

      graph.addEdge(producer.fromBlock, consumer.fromBlock, {
        fromEntry: producer.fromEntry,
        output: producer.output,
        input: consumer.input,
        source: producer.source,
      });
    }
  }

  return graph;
}
