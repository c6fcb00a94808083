// packages/core/src/config/defaults.ts

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_HOME_DIRNAME,
  DEFAULT_MAX_PARALLEL,
  GITHUB_API_URL,
  GITHUB_RAW_URL,
  GITHUB_TIMEOUT_MS,
} from '../utils/constants.js';

/**
 * Resolve the user's home directory, falling back to $HOME, the working
 * directory, and finally the temp directory.
 */
export function resolveUserHome(): string {
  try {
    const home = homedir();
    if (home) return home;
  } catch {
    // homedir() throws when no home can be determined; try the fallbacks
  }
  if (process.env.HOME) return process.env.HOME;
  return process.cwd() || tmpdir();
}

export const DEFAULT_CONFIG = {
  home: join(resolveUserHome(), DEFAULT_HOME_DIRNAME),
  github: {
    apiUrl: GITHUB_API_URL,
    rawUrl: GITHUB_RAW_URL,
    timeoutMs: GITHUB_TIMEOUT_MS,
  },
  execution: {
    mode: 'sequential',
    maxParallel: DEFAULT_MAX_PARALLEL,
  },
  validation: {
    strict: true,
  },
  logLevel: 'info',
} satisfies ProjectConfig;
