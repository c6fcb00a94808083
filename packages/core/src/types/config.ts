// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { ExecutionMode } from './workflow.js';

export interface GithubConfig {
  token?: string;
  apiUrl: string;
  rawUrl: string;
  timeoutMs: number;
}

export interface ExecutionConfig {
  mode: ExecutionMode;
  maxParallel: number;
}

export interface ValidationConfig {
  /** Reject cycles, missing roots and dangling labels at compile time. */
  strict: boolean;
}

export interface ProjectConfig {
  /** Root directory for installed blocks. */
  home: string;
  github: GithubConfig;
  execution: ExecutionConfig;
  validation: ValidationConfig;
  logLevel: LogLevel;
}
