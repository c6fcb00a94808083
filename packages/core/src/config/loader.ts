// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ExecutionConfig, GithubConfig, ProjectConfig, ValidationConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

export type ConfigOverrides = {
  home?: string;
  github?: Partial<GithubConfig>;
  execution?: Partial<ExecutionConfig>;
  validation?: Partial<ValidationConfig>;
  logLevel?: LogLevel;
};

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are skipped.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/** Map recognised environment variables onto a partial config. */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const layer: PlainObject = {};
  if (env.BLOCKFLOW_HOME) layer.home = env.BLOCKFLOW_HOME;
  if (env.GITHUB_TOKEN) layer.github = { token: env.GITHUB_TOKEN };
  if (env.BLOCKFLOW_LOG_LEVEL) layer.logLevel = env.BLOCKFLOW_LOG_LEVEL;
  return layer;
}

/**
 * Load config with precedence: overrides > environment > .blockflow.yml > defaults.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = structuredClone(DEFAULT_CONFIG);

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (fileConfig !== null && fileConfig !== undefined && !isPlainObject(fileConfig)) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    }
  }

  merged = deepMerge(merged, configFromEnv(options?.env ?? process.env));

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}
