import type { JsonValue, RawDefinition } from './swagger.js';

export const PRIMITIVE_TYPES = [
  'string',
  'boolean',
  'integer',
  'number',
  'array',
  'object',
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

export type ItemSpec =
  | { kind: 'reference'; ref: string }
  | { kind: 'inline'; type?: PrimitiveType };

interface PropertyCommon {
  /** Declared primitive type, when one of the known names. */
  type?: PrimitiveType;
  /** Inline enumeration declared on the property itself. */
  enum?: readonly JsonValue[];
}

export type PropertySpec =
  | (PropertyCommon & { kind: 'reference'; ref: string })
  | (PropertyCommon & { kind: 'array'; items?: ItemSpec })
  | (PropertyCommon & { kind: 'enum'; enum: readonly JsonValue[] })
  | (PropertyCommon & { kind: 'primitive' });

export interface Definition {
  name: string;
  shortName: string;
  properties: ReadonlyMap<string, PropertySpec>;
  /** Present and non-empty only for enum definitions. */
  enumValues?: readonly JsonValue[];
  raw: RawDefinition;
}

export type SchemaIndex = ReadonlyMap<string, string>;

export interface Schema {
  definitions: ReadonlyMap<string, Definition>;
  index: SchemaIndex;
}
