import type { RawItems, RawProperty, SwaggerDocument } from '../types/swagger.js';
import {
  PRIMITIVE_TYPES,
  type Definition,
  type ItemSpec,
  type PrimitiveType,
  type PropertySpec,
  type Schema,
} from '../types/schema.js';
import { buildSchemaIndex, shortName } from './schema-index.js';

const PRIMITIVE_TYPE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

function isPrimitiveType(type: string): type is PrimitiveType {
  return PRIMITIVE_TYPE_SET.has(type);
}

function primitiveType(type: string | undefined): PrimitiveType | undefined {
  return type !== undefined && isPrimitiveType(type) ? type : undefined;
}

function compileItems(items: RawItems | undefined): ItemSpec | undefined {
  if (!items) return undefined;
  if (items.$ref !== undefined) return { kind: 'reference', ref: items.$ref };
  return { kind: 'inline', type: primitiveType(items.type) };
}

export function compileProperty(raw: RawProperty): PropertySpec {
  const type = primitiveType(raw.type);
  const inlineEnum = raw.enum;

  if (raw.$ref !== undefined) {
    return { kind: 'reference', ref: raw.$ref, type, enum: inlineEnum };
  }
  if (type === 'array') {
    return { kind: 'array', items: compileItems(raw.items), type, enum: inlineEnum };
  }
  if (inlineEnum !== undefined) {
    return { kind: 'enum', enum: inlineEnum, type };
  }
  return { kind: 'primitive', type };
}

/**
 * Turn a shape-checked Swagger document into the immutable schema the
 * validator walks. Definition order follows the source document.
 */
export function compileSchema(document: SwaggerDocument): Schema {
  const definitions = new Map<string, Definition>();

  for (const [name, raw] of Object.entries(document.definitions)) {
    const properties = new Map<string, PropertySpec>();
    for (const [propName, prop] of Object.entries(raw.properties ?? {})) {
      properties.set(propName, compileProperty(prop));
    }
    definitions.set(name, {
      name,
      shortName: shortName(name),
      properties,
      enumValues: raw.enum && raw.enum.length > 0 ? raw.enum : undefined,
      raw,
    });
  }

  return {
    definitions,
    index: buildSchemaIndex(definitions.keys()),
  };
}
