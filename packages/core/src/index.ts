// @blockflow/core - Workflow compiler and executor for CLI blocks

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  GithubConfig,
  ExecutionConfig,
  ValidationConfig,
  ProjectConfig,
  // Workflow
  WorkflowManifest,
  BlockSpec,
  Connection,
  EdgeAttributes,
  GraphEdge,
  ExecutionMode,
  RunOptions,
  RunSummary,
  // Blocks
  EntryPort,
  BlockEntry,
  BlockInfo,
  BlockMetadata,
  InstallRequest,
  BlockInstaller,
  Release,
  ReleaseAsset,
  InstallationStats,
  UpdateResult,
  // Events
  BlockResolvedEvent,
  WorkflowCompiledEvent,
  RunStartedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  LevelStartedEvent,
  BlockStartedEvent,
  BlockCompletedEvent,
  BlockFailedEvent,
  InstallSkippedEvent,
  InstallCompletedEvent,
  UpdateCompletedEvent,
  EngineEvent,
} from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  WorkflowError,
  ManifestError,
  ResolutionError,
  GraphError,
  ExecutionError,
  PackageError,
  errorMessage,
  createLogger,
  silentLogger,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  BLOCK_MANIFEST_FILE,
  CONFIG_FILENAME,
  DEFAULT_MAX_PARALLEL,
  STDERR_MAX_CHARS,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  resolveUserHome,
  projectConfigSchema,
  validateConfig,
  loadConfig,
  deepMerge,
  configFromEnv,
} from './config/index.js';
export type { ProjectConfigInput, ConfigOverrides } from './config/index.js';

// Engine (manifest, graph, execution)
export {
  parseManifest,
  loadManifest,
  workflowManifestSchema,
  WorkflowGraph,
  buildGraph,
  findRoots,
  findRoot,
  findCycle,
  findDanglingInputs,
  findFinalOutputs,
  validateGraph,
  ResultStore,
  runProcess,
  nodeProcessRunner,
  BlockExecutor,
  BlockResolver,
  traverseBreadthFirst,
  traverseDataflow,
  EventBus,
  WorkflowManager,
} from './engine/index.js';
export type {
  BlockVertex,
  DanglingInput,
  GraphReport,
  ProcessInput,
  ProcessResult,
  ProcessRunner,
  ExecuteArgs,
  ExecuteResult,
  ResolvedListener,
  BreadthFirstHooks,
  DataflowOptions,
  VisitFn,
  EngineEventInput,
  CompileOptions,
  CompiledWorkflow,
  WorkflowManagerOptions,
} from './engine/index.js';

// Package manager
export {
  PackageManager,
  GithubClient,
  tagCandidates,
  parseBlockManifest,
  blockManifestSchema,
  blockEntrySchema,
  platformKey,
} from './blocks/index.js';
export type { PackageManagerOptions, GithubClientOptions } from './blocks/index.js';
