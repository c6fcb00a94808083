// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  ConfigError,
  WorkflowError,
  ManifestError,
  ResolutionError,
  GraphError,
  ExecutionError,
  PackageError,
  errorMessage,
} from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
