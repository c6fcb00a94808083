// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_MAX_PARALLEL,
  GITHUB_API_URL,
  GITHUB_RAW_URL,
  GITHUB_TIMEOUT_MS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const githubConfigSchema = z.object({
  token: z.string().min(1).optional(),
  apiUrl: z.string().url().default(GITHUB_API_URL),
  rawUrl: z.string().url().default(GITHUB_RAW_URL),
  timeoutMs: z.number().int().positive().default(GITHUB_TIMEOUT_MS),
});

const executionConfigSchema = z.object({
  mode: z.enum(['sequential', 'dataflow']).default('sequential'),
  maxParallel: z.number().int().positive().max(64).default(DEFAULT_MAX_PARALLEL),
});

const validationConfigSchema = z.object({
  strict: z.boolean().default(true),
});

export const projectConfigSchema = z.object({
  home: z.string().min(1),
  github: githubConfigSchema.default({}),
  execution: executionConfigSchema.default({}),
  validation: validationConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const first = result.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issues}`, first?.path.join('.'));
  }
  return result.data;
}
