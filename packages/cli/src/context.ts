// packages/cli/src/context.ts -- Wires config, logging and managers for one CLI invocation

import type { ConfigOverrides, Logger, ProjectConfig } from '@blockflow/core';
import { EventBus, GithubClient, PackageManager, WorkflowManager, createLogger, loadConfig } from '@blockflow/core';

export interface CliContext {
  config: ProjectConfig;
  logger: Logger;
  events: EventBus;
  packages: PackageManager;
  workflows: WorkflowManager;
}

export interface ContextOptions {
  verbose?: boolean;
  overrides?: ConfigOverrides;
}

export type ContextFactory = (options: ContextOptions) => Promise<CliContext>;

export async function openContext(options: ContextOptions = {}): Promise<CliContext> {
  const config = loadConfig({ overrides: options.overrides });
  const logger = createLogger(options.verbose ? 'debug' : config.logLevel, 'blockflow');
  const events = new EventBus();

  const client = new GithubClient(config.github);
  const packages = await PackageManager.open({
    home: config.home,
    client,
    logger: logger.child('packages'),
    events,
  });
  const workflows = new WorkflowManager({
    installer: packages,
    logger: logger.child('workflows'),
    events,
    strict: config.validation.strict,
    execution: config.execution,
  });

  return { config, logger, events, packages, workflows };
}
