// packages/core/src/types/events.ts

/**
 * Events emitted while compiling and running workflows.
 * Type names are dot-separated; consumed by the CLI renderer.
 */

// -- Compile events --
export interface BlockResolvedEvent {
  type: 'block.resolved';
  workflow: string;
  block: string;
  version: string;
  binaryPath: string;
  timestamp: string;
}

export interface WorkflowCompiledEvent {
  type: 'workflow.compiled';
  workflow: string;
  vertices: number;
  edges: number;
  roots: string[];
  timestamp: string;
}

// -- Run lifecycle --
export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  workflow: string;
  mode: 'sequential' | 'dataflow';
  roots: string[];
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  workflow: string;
  executed: number;
  durationMs: number;
  timestamp: string;
}

export interface RunFailedEvent {
  type: 'run.failed';
  runId: string;
  workflow: string;
  error: string;
  block?: string;
  timestamp: string;
}

// -- Traversal / block events --
export interface LevelStartedEvent {
  type: 'level.started';
  runId: string;
  level: number;
  vertices: string[];
  timestamp: string;
}

export interface BlockStartedEvent {
  type: 'block.started';
  runId: string;
  block: string;
  isRoot: boolean;
  timestamp: string;
}

export interface BlockCompletedEvent {
  type: 'block.completed';
  runId: string;
  block: string;
  outputs: string[];
  durationMs: number;
  timestamp: string;
}

export interface BlockFailedEvent {
  type: 'block.failed';
  runId: string;
  block: string;
  error: string;
  timestamp: string;
}

// -- Package manager --
export interface InstallSkippedEvent {
  type: 'install.skipped';
  block: string;
  version: string;
  timestamp: string;
}

export interface InstallCompletedEvent {
  type: 'install.completed';
  block: string;
  version: string;
  binaryPath: string;
  timestamp: string;
}

export interface UpdateCompletedEvent {
  type: 'update.completed';
  block: string;
  fromVersion: string;
  version: string;
  binaryPath: string;
  timestamp: string;
}

export type EngineEvent =
  | BlockResolvedEvent
  | WorkflowCompiledEvent
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | LevelStartedEvent
  | BlockStartedEvent
  | BlockCompletedEvent
  | BlockFailedEvent
  | InstallSkippedEvent
  | InstallCompletedEvent
  | UpdateCompletedEvent;
