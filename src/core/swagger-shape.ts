import { readFileSync } from 'node:fs';
import { Ajv2020 } from 'ajv/dist/2020.js';
import type { AnySchema, ErrorObject, ValidateFunction } from 'ajv';
import type { SwaggerDocument } from '../types/swagger.js';
import { getSwaggerShapeSchemaPath } from '../utils/paths.js';

export type ShapeCheckResult =
  | { valid: true; document: SwaggerDocument }
  | { valid: false; errors: string[] };

let validateFn: ValidateFunction<SwaggerDocument> | null = null;

function getValidator(): ValidateFunction<SwaggerDocument> {
  if (validateFn) return validateFn;

  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const schema: AnySchema = JSON.parse(readFileSync(getSwaggerShapeSchemaPath(), 'utf-8'));
  validateFn = ajv.compile<SwaggerDocument>(schema);
  return validateFn;
}

function describeError(err: ErrorObject): string {
  return `${err.instancePath || '/'} ${err.message ?? 'unknown error'}`;
}

export function checkSwaggerShape(data: unknown): ShapeCheckResult {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, document: data };
  }
  // Keep the report short for documents with thousands of definitions
  const errors = (validate.errors ?? []).slice(0, 10).map(describeError);
  return { valid: false, errors };
}
