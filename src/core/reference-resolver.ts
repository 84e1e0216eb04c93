import type { Schema } from '../types/schema.js';
import { shortName } from './schema-index.js';

const DEFINITIONS_PREFIX = '#/definitions/';

export function stripReferencePrefix(ref: string): string {
  return ref.startsWith(DEFINITIONS_PREFIX) ? ref.slice(DEFINITIONS_PREFIX.length) : ref;
}

/**
 * Resolve a `$ref` pointer or a bare/short name to a full definition name.
 * Returns undefined when the schema has no matching definition.
 */
export function resolveReference(refOrName: string, schema: Schema): string | undefined {
  const name = stripReferencePrefix(refOrName);
  if (schema.definitions.has(name)) return name;
  return schema.index.get(shortName(name));
}
