import type { RawDefinition } from '../types/swagger.js';
import type { Schema } from '../types/schema.js';

const MAX_SUGGESTIONS = 10;

export type DefinitionLookup =
  | { kind: 'found'; fullName: string; raw: RawDefinition }
  | { kind: 'missing'; suggestions: string[]; total: number };

/**
 * Find a definition by short or full name for display. When nothing matches,
 * return names that contain the query (case-insensitive).
 */
export function lookupDefinition(schema: Schema, name: string): DefinitionLookup {
  const fullName = schema.index.get(name) ?? name;
  const definition = schema.definitions.get(fullName);
  if (definition) {
    return { kind: 'found', fullName, raw: definition.raw };
  }

  const needle = name.toLowerCase();
  const suggestions = [...schema.definitions.keys()]
    .filter((candidate) => candidate.toLowerCase().includes(needle))
    .slice(0, MAX_SUGGESTIONS);
  return { kind: 'missing', suggestions, total: schema.definitions.size };
}
