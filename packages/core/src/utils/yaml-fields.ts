// packages/core/src/utils/yaml-fields.ts -- zod field types for documents read with the failsafe YAML schema

import { z } from 'zod';

// The failsafe schema keeps every scalar as written, so nulls arrive as text.
const NULL_SPELLINGS = new Set(['', '~', 'null', 'Null', 'NULL']);
const TRUE_SPELLINGS = new Set(['true', 'True', 'TRUE', 'yes', 'Yes', 'YES', 'on', 'On', 'ON']);
const FALSE_SPELLINGS = new Set(['false', 'False', 'FALSE', 'no', 'No', 'NO', 'off', 'Off', 'OFF']);

/** Map a YAML null (empty, `~`, `null`) to undefined; pass anything else through. */
export function absent(value: unknown): unknown {
  return typeof value === 'string' && NULL_SPELLINGS.has(value) ? undefined : value;
}

/** Optional string; null and missing become ''. */
export const text = z.preprocess(absent, z.string().nullish()).transform((v) => v ?? '');

/** Optional boolean in YAML 1.1 spellings; null and missing become false. */
export const flag = z.preprocess(absent, z.union([z.string(), z.boolean()]).nullish()).transform((v, ctx) => {
  if (v === null || v === undefined) return false;
  if (typeof v === 'boolean') return v;
  if (TRUE_SPELLINGS.has(v)) return true;
  if (FALSE_SPELLINGS.has(v)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
  return z.NEVER;
});

/** Optional list; null and missing become []. */
export const list = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess(absent, z.array(item).nullish()).transform((v) => v ?? []);

/** Optional mapping; null and missing become `fallback`. */
export const section = <T extends z.ZodTypeAny>(shape: T, fallback: z.output<T>) =>
  z.preprocess(absent, shape.nullish()).transform((v): z.output<T> => v ?? fallback);
