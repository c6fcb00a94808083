// packages/core/src/engine/workflow-manager.ts

import type { BlockInstaller, BlockMetadata } from '../types/blocks.js';
import type { ExecutionConfig } from '../types/config.js';
import type { ExecutionMode, RunOptions, RunSummary, WorkflowManifest } from '../types/workflow.js';
import { DEFAULT_MAX_PARALLEL } from '../utils/constants.js';
import { ExecutionError, WorkflowError, errorMessage } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { BlockExecutor } from './block-executor.js';
import { BlockResolver } from './block-resolver.js';
import { EventBus } from './event-bus.js';
import type { WorkflowGraph } from './graph.js';
import { findFinalOutputs, findRoot, findRoots, validateGraph } from './graph-analysis.js';
import { buildGraph } from './graph-builder.js';
import { loadManifest } from './manifest-parser.js';
import type { ProcessRunner } from './process-runner.js';
import { nodeProcessRunner } from './process-runner.js';
import { ResultStore } from './result-store.js';
import { traverseBreadthFirst, traverseDataflow } from './scheduler.js';

export interface WorkflowManagerOptions {
  installer: BlockInstaller;
  runner?: ProcessRunner;
  logger?: Logger;
  events?: EventBus;
  /** Reject graphs without a root, with a cycle or with dangling inputs at compile time. */
  strict?: boolean;
  execution?: Partial<ExecutionConfig>;
}

export interface CompileOptions {
  /** Slot to register the workflow under; defaults to the manifest's name. */
  name?: string;
}

export interface CompiledWorkflow {
  name: string;
  manifest: WorkflowManifest;
  graph: WorkflowGraph;
  metadata: Map<string, BlockMetadata>;
  results: ResultStore;
  roots: string[];
  finalOutputs: string[];
}

/**
 * Owns compiled workflows and their result stores. Compiling parses the
 * manifest, builds and checks the graph, and installs every block;
 * running walks the graph and feeds each block's binary.
 */
export class WorkflowManager {
  readonly events: EventBus;
  private workflows = new Map<string, CompiledWorkflow>();
  private resolver: BlockResolver;
  private runner: ProcessRunner;
  private logger: Logger;
  private strict: boolean;
  private mode: ExecutionMode;
  private maxParallel: number;

  constructor(options: WorkflowManagerOptions) {
    this.resolver = new BlockResolver(options.installer);
    this.runner = options.runner ?? nodeProcessRunner;
    this.logger = options.logger ?? silentLogger;
    this.events = options.events ?? new EventBus();
    this.strict = options.strict ?? true;
    this.mode = options.execution?.mode ?? 'sequential';
    this.maxParallel = options.execution?.maxParallel ?? DEFAULT_MAX_PARALLEL;
  }

  async compileWorkflow(path: string, options: CompileOptions = {}): Promise<CompiledWorkflow> {
    const manifest = await loadManifest(path);
    this.logger.debug(`loaded manifest ${path}`);
    return this.compileManifest(manifest, options);
  }

  async compileManifest(manifest: WorkflowManifest, options: CompileOptions = {}): Promise<CompiledWorkflow> {
    const name = options.name ?? manifest.name;
    if (name === '') {
      this.logger.warn('workflow manifest has no workflow_name; registering it under ""');
    }

    const graph = buildGraph(manifest.blocks, manifest.connections);
    let roots: string[];
    let finalOutputs: string[];
    if (this.strict) {
      ({ roots, finalOutputs } = validateGraph(graph, manifest.connections));
    } else {
      roots = findRoots(graph);
      finalOutputs = findFinalOutputs(manifest.connections);
    }

    const metadata = await this.resolver.resolve(manifest.blocks, (spec, meta) => {
      this.logger.debug(`resolved ${spec.name} -> ${meta.binaryPath}`);
      this.events.emitEvent({
        type: 'block.resolved',
        workflow: name,
        block: spec.name,
        version: meta.version,
        binaryPath: meta.binaryPath,
      });
    });

    if (this.workflows.has(name)) {
      this.logger.warn(`workflow "${name}" was already compiled; replacing it`);
    }
    const compiled: CompiledWorkflow = {
      name,
      manifest,
      graph,
      metadata,
      results: new ResultStore(),
      roots,
      finalOutputs,
    };
    this.workflows.set(name, compiled);

    this.events.emitEvent({
      type: 'workflow.compiled',
      workflow: name,
      vertices: graph.order(),
      edges: graph.size(),
      roots,
    });
    this.logger.debug(`compiled workflow "${name}" (${graph.order()} blocks, ${graph.size()} edges)`);
    return compiled;
  }

  async runWorkflow(name: string, options: RunOptions = {}): Promise<RunSummary> {
    const compiled = this.require(name);
    const { graph } = compiled;

    findRoot(graph);
    const roots = findRoots(graph);

    const mode = options.mode ?? this.mode;
    const runId = generateRunId();
    const start = Date.now();
    compiled.results.clear();

    const executor = new BlockExecutor(compiled.results, this.runner, this.logger.child(name));
    const visit = async (block: string): Promise<void> => {
      const vertex = graph.vertex(block);
      const metadata = compiled.metadata.get(block);
      if (!metadata) {
        throw new ExecutionError(`block "${block}" was not resolved`, block);
      }

      const incomingFrom = graph.predecessors(block);
      this.events.emitEvent({ type: 'block.started', runId, block, isRoot: incomingFrom.length === 0 });
      const blockStart = Date.now();
      try {
        const result = await executor.execute({
          vertex,
          metadata,
          incomingFrom,
          outgoingTo: graph.successors(block),
        });
        this.events.emitEvent({
          type: 'block.completed',
          runId,
          block,
          outputs: result.outputs,
          durationMs: Date.now() - blockStart,
        });
      } catch (err) {
        this.events.emitEvent({ type: 'block.failed', runId, block, error: errorMessage(err) });
        throw err;
      }
    };

    this.events.emitEvent({ type: 'run.started', runId, workflow: name, mode, roots });
    this.logger.debug(`running workflow "${name}" (${mode}, run ${runId})`);

    let executed: string[];
    try {
      executed =
        mode === 'dataflow'
          ? await traverseDataflow(graph, roots, visit, {
              maxParallel: options.maxParallel ?? this.maxParallel,
            })
          : await traverseBreadthFirst(graph, roots, visit, {
              onLevel: (level, vertices) => {
                this.events.emitEvent({ type: 'level.started', runId, level, vertices });
              },
            });
    } catch (err) {
      this.events.emitEvent({
        type: 'run.failed',
        runId,
        workflow: name,
        error: errorMessage(err),
        block: err instanceof ExecutionError ? err.blockName : undefined,
      });
      this.logger.debug(`workflow "${name}" failed: ${errorMessage(err)}`);
      throw err;
    }

    const overwritten = compiled.results.overwrittenLabels();
    if (overwritten.length > 0) {
      this.logger.warn(`labels written more than once: ${overwritten.join(', ')}`);
    }

    const durationMs = Date.now() - start;
    this.events.emitEvent({ type: 'run.completed', runId, workflow: name, executed: executed.length, durationMs });
    return {
      runId,
      workflow: name,
      executed,
      results: compiled.results.snapshot(),
      durationMs,
    };
  }

  getWorkflow(name: string): CompiledWorkflow | undefined {
    return this.workflows.get(name);
  }

  getGraph(name: string): WorkflowGraph {
    return this.require(name).graph;
  }

  getMetadata(name: string): Map<string, BlockMetadata> {
    return this.require(name).metadata;
  }

  getResults(name: string): ResultStore {
    return this.require(name).results;
  }

  listWorkflows(): string[] {
    return [...this.workflows.keys()];
  }

  removeWorkflow(name: string): boolean {
    return this.workflows.delete(name);
  }

  private require(name: string): CompiledWorkflow {
    const compiled = this.workflows.get(name);
    if (!compiled) {
      throw new WorkflowError(`workflow "${name}" has not been compiled`, name);
    }
    return compiled;
  }
}
