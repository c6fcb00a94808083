// packages/core/src/types/index.ts -- barrel re-export

export type {
  GithubConfig,
  ExecutionConfig,
  ValidationConfig,
  ProjectConfig,
} from './config.js';

export type {
  WorkflowManifest,
  BlockSpec,
  Connection,
  EdgeAttributes,
  GraphEdge,
  ExecutionMode,
  RunOptions,
  RunSummary,
} from './workflow.js';

export type {
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
} from './blocks.js';

export type {
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
} from './events.js';
