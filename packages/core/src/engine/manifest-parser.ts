// packages/core/src/engine/manifest-parser.ts

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { WorkflowManifest } from '../types/workflow.js';
import { ManifestError, errorMessage } from '../utils/errors.js';
import { absent, flag, list, text } from '../utils/yaml-fields.js';

const blockSchema = z.object({
  name: text,
  version: text,
  github: text,
  force: flag,
});

const connectionSchema = z
  .object({
    from_block: text,
    from_entry: text,
    output: text,
    input: text,
    source: text,
  })
  .transform((c) => ({
    fromBlock: c.from_block,
    fromEntry: c.from_entry,
    output: c.output,
    input: c.input,
    source: c.source,
  }));

export const workflowManifestSchema = z
  .object({
    workflow_name: text,
    version: text,
    description: text,
    blocks: list(blockSchema),
    connections: list(connectionSchema),
  })
  .transform(
    (m): WorkflowManifest => ({
      name: m.workflow_name,
      version: m.version,
      description: m.description,
      blocks: m.blocks,
      connections: m.connections,
    }),
  );

/**
 * Decode manifest text into its declarative form. Missing fields become
 * empty values; only structurally wrong documents are rejected.
 */
export function parseManifest(document: string, path?: string): WorkflowManifest {
  let raw: unknown;
  try {
    raw = parseYaml(document, { schema: 'failsafe' });
  } catch (err) {
    throw new ManifestError(`unmarshal workflow yaml: ${errorMessage(err)}`, path, { cause: err });
  }

  const result = workflowManifestSchema.safeParse(absent(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ManifestError(`invalid workflow manifest: ${issues}`, path);
  }
  return result.data;
}

/** Read and parse a manifest file. */
export async function loadManifest(path: string): Promise<WorkflowManifest> {
  let document: string;
  try {
    document = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ManifestError(`read workflow file: ${errorMessage(err)}`, path, { cause: err });
  }
  return parseManifest(document, path);
}
