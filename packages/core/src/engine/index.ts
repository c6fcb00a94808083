// packages/core/src/engine -- Manifest parsing, graph construction, and execution

export { parseManifest, loadManifest, workflowManifestSchema } from './manifest-parser.js';
export { WorkflowGraph } from './graph.js';
export type { BlockVertex } from './graph.js';
export { buildGraph } from './graph-builder.js';
export {
  findRoots,
  findRoot,
  findCycle,
  findDanglingInputs,
  findFinalOutputs,
  validateGraph,
} from './graph-analysis.js';
export type { DanglingInput, GraphReport } from './graph-analysis.js';
export { ResultStore } from './result-store.js';
export { runProcess, nodeProcessRunner } from './process-runner.js';
export type { ProcessInput, ProcessResult, ProcessRunner } from './process-runner.js';
export { BlockExecutor } from './block-executor.js';
export type { ExecuteArgs, ExecuteResult } from './block-executor.js';
export { BlockResolver } from './block-resolver.js';
export type { ResolvedListener } from './block-resolver.js';
export { traverseBreadthFirst, traverseDataflow } from './scheduler.js';
export type { BreadthFirstHooks, DataflowOptions, VisitFn } from './scheduler.js';
export { EventBus } from './event-bus.js';
export type { EngineEventInput } from './event-bus.js';
export { WorkflowManager } from './workflow-manager.js';
export type { CompileOptions, CompiledWorkflow, WorkflowManagerOptions } from './workflow-manager.js';
