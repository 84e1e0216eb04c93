import type { PrimitiveType, PropertySpec } from '../types/schema.js';
import type { ValidationIssue } from '../types/validation.js';
import { createIssue } from './issues.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Name of the JSON shape a value has, as used in mismatch messages. */
export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

function matchesType(value: unknown, type: PrimitiveType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
  }
}

export function checkType(
  value: unknown,
  spec: PropertySpec,
  path: string,
): ValidationIssue[] {
  if (value === null || value === undefined) return [];
  const expected = spec.type;
  if (!expected) return [];

  if ((expected === 'integer' || expected === 'number') && typeof value === 'boolean') {
    return [createIssue('TYPE_MISMATCH', path, `expected ${expected}, got boolean`)];
  }
  if (!matchesType(value, expected)) {
    return [
      createIssue('TYPE_MISMATCH', path, `expected ${expected}, got ${describeJsonType(value)}`),
    ];
  }
  return [];
}
