import type { Readable } from 'node:stream';
import type { BlockInstaller, ProcessInput, ProcessRunner } from '@blockflow/core';
import { EventBus, GithubClient, PackageManager, WorkflowManager, loadConfig, silentLogger } from '@blockflow/core';

import type { CliContext, ContextFactory, ContextOptions } from '../src/context.js';

async function readInput(stdin: ProcessInput): Promise<string> {
  if (typeof stdin === 'string') return stdin;
  return readStream(stdin);
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString('utf-8');
}

const installer: BlockInstaller = {
  install: async (request) => {
    const name = request.repo.split('/')[1] ?? request.repo;
    return {
      name,
      version: request.version ?? 'v1.0.0',
      sourceRepo: request.repo,
      binaryPath: `/blocks/${name}/bin/${name}`,
      installedAt: '2026-01-01T00:00:00.000Z',
      lastUpdated: '2026-01-01T00:00:00.000Z',
      isActive: true,
      entries: {},
    };
  },
};

/** Every block upper-cases its input. */
const runner: ProcessRunner = {
  run: async (_binary, _args, stdin) => ({
    stdout: (await readInput(stdin)).toUpperCase(),
    stderr: '',
    exitCode: 0,
    signal: null,
  }),
};

/**
 * Context factory backed by an empty install home, an offline GitHub
 * client and an in-process block runner. Records the options it was
 * opened with.
 */
export function testContextFactory(home: string): { factory: ContextFactory; calls: ContextOptions[] } {
  const calls: ContextOptions[] = [];
  const factory: ContextFactory = async (options) => {
    calls.push(options);
    const config = loadConfig({ skipFile: true, env: {}, overrides: { ...options.overrides, home } });
    const events = new EventBus();
    const client = new GithubClient({
      adapter: async () => {
        throw new Error('offline');
      },
    });
    const packages = await PackageManager.open({ home, client, events });
    const workflows = new WorkflowManager({ installer, runner, events, execution: config.execution });
    const ctx: CliContext = { config, logger: silentLogger, events, packages, workflows };
    return ctx;
  };
  return { factory, calls };
}
