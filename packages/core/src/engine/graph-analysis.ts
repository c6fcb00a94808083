// packages/core/src/engine/graph-analysis.ts

import type { Connection } from '../types/workflow.js';
import { GraphError } from '../utils/errors.js';
import type { WorkflowGraph } from './graph.js';

export interface DanglingInput {
  block: string;
  label: string;
}

export interface GraphReport {
  roots: string[];
  /** Output labels no connection consumes. */
  finalOutputs: string[];
}

/** Vertices with no incoming edges, in block declaration order. */
export function findRoots(graph: WorkflowGraph): string[] {
  return graph.vertexNames().filter((name) => graph.inDegree(name) === 0);
}

/** The first root in declaration order. Throws GraphError when there is none. */
export function findRoot(graph: WorkflowGraph): string {
  const [root] = findRoots(graph);
  if (root === undefined) {
    throw new GraphError('no root node found');
  }
  return root;
}

/**
 * Depth-first search with white/grey/black colouring. Returns the first
 * cycle found as a closed path (`[a, b, a]`), or undefined for a DAG.
 */
export function findCycle(graph: WorkflowGraph): string[] | undefined {
  const GREY = 1;
  const BLACK = 2;
  const colour = new Map<string, number>();
  const stack: string[] = [];

  const visit = (name: string): string[] | undefined => {
    colour.set(name, GREY);
    stack.push(name);
    for (const next of graph.successors(name)) {
      const state = colour.get(next);
      if (state === GREY) {
        return [...stack.slice(stack.indexOf(next)), next];
      }
      if (state === undefined) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    colour.set(name, BLACK);
    return undefined;
  };

  for (const name of graph.vertexNames()) {
    if (colour.has(name)) continue;
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return undefined;
}

/** Input labels that no connection produces. */
export function findDanglingInputs(connections: Connection[]): DanglingInput[] {
  const produced = new Set(connections.map((c) => c.output).filter((o) => o !== ''));
  return connections
    .filter((c) => c.input !== '' && !produced.has(c.input))
    .map((c) => ({ block: c.fromBlock, label: c.input }));
}

/** Output labels no connection reads; the results a run leaves behind. */
export function findFinalOutputs(connections: Connection[]): string[] {
  const consumed = new Set(connections.map((c) => c.input).filter((i) => i !== ''));
  const outputs = connections.map((c) => c.output).filter((o) => o !== '' && !consumed.has(o));
  return [...new Set(outputs)];
}

/**
 * Reject graphs that cannot run: no root, a cycle, or an input label no
 * block produces.
 */
export function validateGraph(graph: WorkflowGraph, connections: Connection[]): GraphReport {
  const roots = findRoots(graph);
  if (roots.length === 0) {
    throw new GraphError('no root node found');
  }

  const cycle = findCycle(graph);
  if (cycle) {
    throw new GraphError(`workflow contains a cycle: ${cycle.join(' -> ')}`, undefined, cycle[0]);
  }

  const [dangling] = findDanglingInputs(connections);
  if (dangling) {
    throw new GraphError(
      `block "${dangling.block}" reads input "${dangling.label}" which no connection produces`,
      dangling.label,
      dangling.block,
    );
  }

  return { roots, finalOutputs: findFinalOutputs(connections) };
}
