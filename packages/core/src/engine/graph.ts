// packages/core/src/engine/graph.ts

import type { BlockSpec, Connection, EdgeAttributes, GraphEdge } from '../types/workflow.js';
import { GraphError } from '../utils/errors.js';

/** A block placed in the graph together with the connections it declares. */
export interface BlockVertex {
  name: string;
  block: BlockSpec;
  connections: Connection[];
}

/**
 * Directed multigraph of blocks keyed by name. Iteration follows insertion
 * order everywhere, so traversals over the same manifest are reproducible.
 */
export class WorkflowGraph {
  private vertices = new Map<string, BlockVertex>();
  private outgoingEdges = new Map<string, GraphEdge[]>();
  private incomingEdges = new Map<string, GraphEdge[]>();
  private edgeKeys = new Set<string>();

  /** Add or replace a vertex. Replacing keeps the vertex's edges and position. */
  addVertex(block: BlockSpec): BlockVertex {
    const existing = this.vertices.get(block.name);
    const vertex: BlockVertex = { name: block.name, block, connections: existing?.connections ?? [] };
    this.vertices.set(block.name, vertex);
    if (!this.outgoingEdges.has(block.name)) this.outgoingEdges.set(block.name, []);
    if (!this.incomingEdges.has(block.name)) this.incomingEdges.set(block.name, []);
    return vertex;
  }

  /** Attach a declared connection to the vertex that owns it. */
  attachConnection(connection: Connection): void {
    const vertex = this.vertices.get(connection.fromBlock);
    if (!vertex) {
      throw new GraphError(
        `connection "${connection.output}" references unknown block "${connection.fromBlock}"`,
        connection.output,
        connection.fromBlock,
      );
    }
    vertex.connections.push(connection);
  }

  /**
   * Add an edge between two existing vertices. An edge identical to one
   * already present is ignored.
   */
  addEdge(source: string, target: string, attributes: EdgeAttributes): void {
    if (!this.vertices.has(source)) {
      throw new GraphError(`edge source "${source}" is not a block`, attributes.output, source);
    }
    if (!this.vertices.has(target)) {
      throw new GraphError(`edge target "${target}" is not a block`, attributes.input, target);
    }

    const key = [source, target, attributes.fromEntry, attributes.output, attributes.input, attributes.source].join('\u0000');
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);

    const edge: GraphEdge = { source, target, attributes: { ...attributes } };
    this.outgoingEdges.get(source)?.push(edge);
    this.incomingEdges.get(target)?.push(edge);
  }

  vertex(name: string): BlockVertex {
    const vertex = this.vertices.get(name);
    if (!vertex) {
      throw new GraphError(`block "${name}" is not part of the workflow`, undefined, name);
    }
    return vertex;
  }

  vertexNames(): string[] {
    return [...this.vertices.keys()];
  }

  order(): number {
    return this.vertices.size;
  }

  size(): number {
    return this.edgeKeys.size;
  }

  edges(): GraphEdge[] {
    return [...this.outgoingEdges.values()].flat();
  }

  incoming(name: string): GraphEdge[] {
    return [...(this.incomingEdges.get(name) ?? [])];
  }

  outgoing(name: string): GraphEdge[] {
    return [...(this.outgoingEdges.get(name) ?? [])];
  }

  inDegree(name: string): number {
    return this.incomingEdges.get(name)?.length ?? 0;
  }

  /** Distinct vertices with an edge into `name`, in edge order. */
  predecessors(name: string): string[] {
    return unique(this.incoming(name).map((e) => e.source));
  }

  /** Distinct vertices `name` has an edge to, in edge order. */
  successors(name: string): string[] {
    return unique(this.outgoing(name).map((e) => e.target));
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
