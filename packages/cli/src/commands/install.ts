import type { ContextFactory } from '../context.js';
import { renderEvent, withSpinner } from '../render.js';
import { reportError } from '../utils.js';

export interface InstallOptions {
  version?: string;
  force?: boolean;
}

export async function installCommand(
  openContext: ContextFactory,
  verbose: boolean,
  repo: string,
  options: InstallOptions,
): Promise<void> {
  try {
    const ctx = await openContext({ verbose });
    ctx.events.on('event', renderEvent);
    const label = options.version ? `${repo}@${options.version}` : repo;
    const metadata = await withSpinner(`Installing ${label}...`, () =>
      ctx.packages.install({ repo, version: options.version, force: options.force }),
    );
    console.log(metadata.binaryPath);
  } catch (error) {
    reportError(error);
  }
}
