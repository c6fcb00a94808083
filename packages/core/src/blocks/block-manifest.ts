// packages/core/src/blocks/block-manifest.ts

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BlockEntry, BlockInfo } from '../types/blocks.js';
import { PackageError, errorMessage } from '../utils/errors.js';
import { absent, list, section, text } from '../utils/yaml-fields.js';

/** Block names become directory names under the install home. */
const blockName = z.string().regex(/^[\w.-]+$/, 'must contain only letters, digits, ".", "_" or "-"');

const portSchema = z.object({ name: text, type: text });

export const blockEntrySchema = z.object({
  name: z.string().min(1),
  command: text,
  description: text,
  inputs: list(portSchema),
  outputs: list(portSchema),
});

export const blockManifestSchema = z
  .object({
    name: blockName,
    description: text,
    version: text,
    source: section(z.object({ type: text, repo: text }), { type: '', repo: '' }),
    binary: section(
      z.object({
        from: text,
        assets: section(z.record(z.string()), {}),
      }),
      { from: '', assets: {} },
    ),
    entries: list(blockEntrySchema),
  })
  .transform(
    (m): BlockInfo => ({
      ...m,
      entries: keyEntries(m.entries),
    }),
  );

function keyEntries(entries: BlockEntry[]): Record<string, BlockEntry> {
  const keyed: Record<string, BlockEntry> = {};
  for (const entry of entries) keyed[entry.name] = entry;
  return keyed;
}

/** Parse an `agentic_support.yaml` document fetched from `repo`. */
export function parseBlockManifest(document: string, repo: string): BlockInfo {
  let raw: unknown;
  try {
    raw = parseYaml(document, { schema: 'failsafe' });
  } catch (err) {
    throw new PackageError(`failed to parse block manifest of ${repo}: ${errorMessage(err)}`, repo, undefined, {
      cause: err,
    });
  }

  const result = blockManifestSchema.safeParse(absent(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new PackageError(`invalid block manifest in ${repo}: ${issues}`, repo);
  }
  return result.data;
}
