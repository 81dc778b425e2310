import { promises as fs } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Ajv from 'ajv/dist/2020';

import primaryKeysSchema from './schema/primary-keys-schema-v1.json';
import { stableStringify } from './deterministicJson';
import { primaryKeyFromJson, primaryKeyToJson, type PrimaryKeyJson, type PrimaryKeyMap } from './primaryKey';

export type PrimaryKeysJson = Record<string, PrimaryKeyJson>;

export type WriteKeysJsonOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validatePrimaryKeys = ajv.compile<PrimaryKeysJson>(primaryKeysSchema);

export function primaryKeyMapToJson(keys: PrimaryKeyMap): PrimaryKeysJson {
  const out: PrimaryKeysJson = Object.create(null);
  for (const [entity, key] of keys) out[entity] = primaryKeyToJson(key);
  return out;
}

/**
 * Serialize the mapping to deterministic JSON (sorted entity names, trailing newline).
 */
export function serializePrimaryKeys(keys: PrimaryKeyMap, options: WriteKeysJsonOptions = {}): string {
  return stableStringify(primaryKeyMapToJson(keys), options.space ?? 2);
}

export async function writePrimaryKeysFile(
  filePath: string,
  keys: PrimaryKeyMap,
  options: WriteKeysJsonOptions = {},
): Promise<void> {
  await fs.mkdir(dirname(resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, serializePrimaryKeys(keys, options), 'utf8');
}

/** Schema violations of `value`, empty when it is a valid primary-key document. */
export function validatePrimaryKeysJson(value: unknown): string[] {
  if (validatePrimaryKeys(value)) return [];
  return (validatePrimaryKeys.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

/**
 * Parse a document produced by {@link serializePrimaryKeys} back into a mapping.
 * Throws when the text is not JSON or does not match the primary-key schema.
 */
export function parsePrimaryKeysJson(text: string): PrimaryKeyMap {
  const parsed: unknown = JSON.parse(text);
  if (!validatePrimaryKeys(parsed)) {
    const problems = validatePrimaryKeysJson(parsed);
    throw new Error(`Invalid primary-key document: ${problems.join('; ')}`);
  }
  const keys: PrimaryKeyMap = new Map();
  for (const [entity, value] of Object.entries(parsed)) keys.set(entity, primaryKeyFromJson(value));
  return keys;
}
