export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface RawItems {
  type?: string;
  $ref?: string;
  enum?: JsonValue[];
}

export interface RawProperty {
  type?: string;
  $ref?: string;
  enum?: JsonValue[];
  items?: RawItems;
  description?: string;
  format?: string;
}

export interface RawDefinition {
  type?: string;
  properties?: Record<string, RawProperty>;
  enum?: JsonValue[];
  description?: string;
}

/** The subset of a Swagger 2.0 document the validator reads. */
export interface SwaggerDocument {
  swagger?: string;
  info?: { title?: string; version?: string };
  definitions: Record<string, RawDefinition>;
}
