// packages/core/src/types/workflow.ts

/**
 * A workflow manifest as written in YAML. Field names are the camelCase
 * form of the snake_case keys on disk; missing scalars become empty strings.
 */
export interface WorkflowManifest {
  name: string;
  version: string;
  description: string;
  blocks: BlockSpec[];
  connections: Connection[];
}

/** A block the workflow depends on, fetched from a GitHub repository. */
export interface BlockSpec {
  name: string;
  /** Release tag; empty means the latest release. */
  version: string;
  /** Repository identifier in `owner/repo` form. */
  github: string;
  force: boolean;
}

/**
 * Wires one entry of a block into the data flow. A connection without an
 * `input` is a root connection whose stdin comes from `source`.
 */
export interface Connection {
  fromBlock: string;
  fromEntry: string;
  output: string;
  input: string;
  source: string;
}

/** Attributes carried by an inferred producer -> consumer edge. */
export interface EdgeAttributes {
  fromEntry: string;
  output: string;
  input: string;
  source: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  attributes: EdgeAttributes;
}

/** Mode the run loop uses to walk the graph. */
export type ExecutionMode = 'sequential' | 'dataflow';

export interface RunOptions {
  mode?: ExecutionMode;
  /** Upper bound on concurrently running blocks in dataflow mode. */
  maxParallel?: number;
}

export interface RunSummary {
  runId: string;
  workflow: string;
  /** Vertices in the order they started executing. */
  executed: string[];
  /** Snapshot of the result store after the run. */
  results: Record<string, string>;
  durationMs: number;
}
