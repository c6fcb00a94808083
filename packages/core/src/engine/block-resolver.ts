// packages/core/src/engine/block-resolver.ts

import type { BlockInstaller, BlockMetadata } from '../types/blocks.js';
import type { BlockSpec } from '../types/workflow.js';
import { ResolutionError, errorMessage } from '../utils/errors.js';

export type ResolvedListener = (spec: BlockSpec, metadata: BlockMetadata) => void;

/**
 * Installs every block a workflow declares, in declaration order, and
 * returns their metadata keyed by the block name used in the workflow.
 * Stops at the first failure.
 */
export class BlockResolver {
  constructor(private installer: BlockInstaller) {}

  async resolve(blocks: BlockSpec[], onResolved?: ResolvedListener): Promise<Map<string, BlockMetadata>> {
    const resolved = new Map<string, BlockMetadata>();
    for (const spec of blocks) {
      let metadata: BlockMetadata;
      try {
        metadata = await this.installer.install({
          repo: spec.github,
          version: spec.version || undefined,
          force: spec.force,
        });
      } catch (err) {
        throw new ResolutionError(`failed to install block '${spec.name}': ${errorMessage(err)}`, spec.name, {
          cause: err,
        });
      }
      resolved.set(spec.name, metadata);
      onResolved?.(spec, metadata);
    }
    return resolved;
  }
}
