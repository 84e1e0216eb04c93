import type { SchemaIndex } from '../types/schema.js';

export const PREFERRED_NAMESPACE = 'Standard';

export function shortName(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(dot + 1);
}

/**
 * Map short definition names to fully-qualified ones.
 * A name carrying the preferred namespace replaces an unmarked entry;
 * otherwise the first name seen keeps the slot.
 */
export function buildSchemaIndex(
  definitionNames: Iterable<string>,
  preferred: string = PREFERRED_NAMESPACE,
): SchemaIndex {
  const index = new Map<string, string>();
  for (const name of definitionNames) {
    const short = shortName(name);
    const existing = index.get(short);
    if (
      existing === undefined ||
      (!existing.includes(preferred) && name.includes(preferred))
    ) {
      index.set(short, name);
    }
  }
  return index;
}
