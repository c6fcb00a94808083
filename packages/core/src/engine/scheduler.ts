// packages/core/src/engine/scheduler.ts

import { DEFAULT_MAX_PARALLEL } from '../utils/constants.js';
import { GraphError } from '../utils/errors.js';
import type { WorkflowGraph } from './graph.js';

export type VisitFn = (name: string) => Promise<void>;

export interface BreadthFirstHooks {
  /** Called before the vertices of each level run. Levels are 0-based. */
  onLevel?: (level: number, vertices: string[]) => void;
}

export interface DataflowOptions {
  maxParallel?: number;
}

/** Predecessors other than the vertex itself. */
function upstream(graph: WorkflowGraph, name: string): string[] {
  return graph.predecessors(name).filter((p) => p !== name);
}

function assertAllVisited(graph: WorkflowGraph, visited: Set<string>): void {
  const stuck = graph.vertexNames().filter((n) => !visited.has(n));
  if (stuck.length > 0) {
    throw new GraphError(
      `blocks never became ready: ${stuck.join(', ')} (the workflow contains a cycle)`,
      undefined,
      stuck[0],
    );
  }
}

/**
 * Level-by-level breadth-first walk from `roots`. A vertex is queued once,
 * after every upstream vertex has been visited, so each block runs once
 * and only after everything it reads from. Vertices run one at a time.
 */
export async function traverseBreadthFirst(
  graph: WorkflowGraph,
  roots: string[],
  visit: VisitFn,
  hooks: BreadthFirstHooks = {},
): Promise<string[]> {
  const visited = new Set<string>();
  const queued = new Set<string>(roots);
  const order: string[] = [];
  let frontier = [...roots];
  let level = 0;

  while (frontier.length > 0) {
    hooks.onLevel?.(level, [...frontier]);
    const next: string[] = [];

    for (const name of frontier) {
      await visit(name);
      visited.add(name);
      order.push(name);

      for (const succ of graph.successors(name)) {
        if (queued.has(succ)) continue;
        if (upstream(graph, succ).every((p) => visited.has(p))) {
          queued.add(succ);
          next.push(succ);
        }
      }
    }

    frontier = next;
    level++;
  }

  assertAllVisited(graph, visited);
  return order;
}

/**
 * Dataflow scheduling: a vertex starts as soon as all of its upstream
 * vertices have finished, with at most `maxParallel` running at once.
 * After the first failure nothing new is started; the walk rejects with
 * that failure once running vertices settle.
 */
export function traverseDataflow(
  graph: WorkflowGraph,
  roots: string[],
  visit: VisitFn,
  options: DataflowOptions = {},
): Promise<string[]> {
  const limit = Math.max(1, options.maxParallel ?? DEFAULT_MAX_PARALLEL);
  const waiting = new Map<string, number>();
  for (const name of graph.vertexNames()) {
    waiting.set(name, upstream(graph, name).length);
  }

  const ready = roots.filter((r) => waiting.get(r) === 0);
  const started = new Set<string>(ready);
  const visited = new Set<string>();
  const order: string[] = [];
  let running = 0;
  let failure: { error: unknown } | undefined;

  return new Promise((resolve, reject) => {
    const finish = () => {
      if (failure) {
        reject(failure.error);
        return;
      }
      try {
        assertAllVisited(graph, visited);
        resolve(order);
      } catch (err) {
        reject(err);
      }
    };

    const pump = () => {
      while (!failure && running < limit && ready.length > 0) {
        const name = ready.shift();
        if (name === undefined) break;
        running++;
        order.push(name);
        visit(name).then(
          () => {
            running--;
            visited.add(name);
            for (const succ of graph.successors(name)) {
              if (succ === name || started.has(succ)) continue;
              const remaining = (waiting.get(succ) ?? 0) - 1;
              waiting.set(succ, remaining);
              if (remaining === 0) {
                started.add(succ);
                ready.push(succ);
              }
            }
            pump();
          },
          (err: unknown) => {
            running--;
            failure ??= { error: err };
            pump();
          },
        );
      }
      if (running === 0 && (failure || ready.length === 0)) finish();
    };

    pump();
  });
}
