import type { Definition, ItemSpec, PropertySpec, Schema } from '../types/schema.js';
import type { ValidationIssue } from '../types/validation.js';
import { resolveReference } from './reference-resolver.js';
import { checkType, describeJsonType, isPlainObject } from './type-check.js';
import {
  childPath,
  createIssue,
  indexPath,
  invalidEnumIssue,
  isEnumMember,
} from './issues.js';

/** Key under which wrapper objects carry the coded value of an enum definition. */
export const WRAPPED_VALUE_KEY = 'Value';

export interface StructuralValidatorOptions {
  /**
   * Report a TYPE_MISMATCH when a value bound to a definition is not an
   * object. Off by default: such values are skipped.
   */
  strictShapes?: boolean;
}

/**
 * Walks a JSON document against the definitions of a compiled schema.
 * Recursion follows the document tree, so cyclic definitions terminate.
 */
export class StructuralValidator {
  constructor(
    public readonly schema: Schema,
    private readonly options: StructuralValidatorOptions = {},
  ) {}

  resolve(refOrName: string): Definition | undefined {
    const name = resolveReference(refOrName, this.schema);
    return name === undefined ? undefined : this.schema.definitions.get(name);
  }

  validate(value: unknown, definitionName: string, path = ''): ValidationIssue[] {
    const definition =
      this.schema.definitions.get(definitionName) ?? this.resolve(definitionName);
    if (!definition) {
      return [createIssue('SCHEMA_NOT_FOUND', path, `'${definitionName}' not in schema`)];
    }
    return this.validateDefinition(value, definition, path);
  }

  private validateDefinition(
    value: unknown,
    definition: Definition,
    path: string,
  ): ValidationIssue[] {
    if (!isPlainObject(value)) {
      if (this.options.strictShapes && value !== null && value !== undefined) {
        return [
          createIssue('TYPE_MISMATCH', path, `expected object, got ${describeJsonType(value)}`),
        ];
      }
      return [];
    }

    const issues: ValidationIssue[] = [];
    for (const [key, fieldValue] of Object.entries(value)) {
      const fieldPath = childPath(path, key);
      const spec = definition.properties.get(key);
      if (!spec) {
        issues.push(
          createIssue(
            'UNKNOWN_FIELD',
            fieldPath,
            `not in '${definition.shortName}' (has ${definition.properties.size} properties)`,
          ),
        );
        continue;
      }
      issues.push(...this.validateField(fieldValue, spec, fieldPath));
    }
    return issues;
  }

  private validateField(value: unknown, spec: PropertySpec, path: string): ValidationIssue[] {
    const issues = checkType(value, spec, path);

    if (spec.enum && value !== null && value !== undefined && !isEnumMember(value, spec.enum)) {
      issues.push(invalidEnumIssue(path, value, spec.enum));
    }

    switch (spec.kind) {
      case 'reference':
        if (isPlainObject(value)) {
          issues.push(...this.validateReference(value, spec.ref, path));
        } else if (this.options.strictShapes && value !== null && value !== undefined) {
          issues.push(...this.validateBareReference(value, spec.ref, path));
        }
        break;
      case 'array':
        if (Array.isArray(value) && spec.items) {
          issues.push(...this.validateItems(value, spec.items, path));
        }
        break;
      case 'enum':
      case 'primitive':
        break;
    }
    return issues;
  }

  private validateReference(
    value: Record<string, unknown>,
    ref: string,
    path: string,
  ): ValidationIssue[] {
    const target = this.resolve(ref);
    if (!target) return this.validate(value, ref, path);

    if (target.enumValues) {
      const inner = value[WRAPPED_VALUE_KEY];
      if (inner !== null && inner !== undefined && !isEnumMember(inner, target.enumValues)) {
        return [invalidEnumIssue(childPath(path, WRAPPED_VALUE_KEY), inner, target.enumValues)];
      }
      return [];
    }
    return this.validateDefinition(value, target, path);
  }

  /** Strict mode only: a scalar or array where a referenced definition is expected. */
  private validateBareReference(value: unknown, ref: string, path: string): ValidationIssue[] {
    const target = this.resolve(ref);
    if (!target) return this.validate(value, ref, path);
    if (target.enumValues) {
      return isEnumMember(value, target.enumValues)
        ? []
        : [invalidEnumIssue(path, value, target.enumValues)];
    }
    return this.validateDefinition(value, target, path);
  }

  private validateItems(items: unknown[], spec: ItemSpec, path: string): ValidationIssue[] {
    switch (spec.kind) {
      case 'inline':
        return [];
      case 'reference': {
        const target = this.resolve(spec.ref);
        if (!target) {
          return items.length > 0
            ? [createIssue('SCHEMA_NOT_FOUND', path, `'${spec.ref}' not in schema`)]
            : [];
        }

        const issues: ValidationIssue[] = [];
        const allowed = target.enumValues;
        items.forEach((item, i) => {
          const itemPath = indexPath(path, i);
          if (allowed) {
            const inner = isPlainObject(item) ? item[WRAPPED_VALUE_KEY] : item;
            if (inner !== null && inner !== undefined && !isEnumMember(inner, allowed)) {
              issues.push(invalidEnumIssue(itemPath, inner, allowed));
            }
          } else if (isPlainObject(item)) {
            issues.push(...this.validateDefinition(item, target, itemPath));
          } else if (this.options.strictShapes && item !== null) {
            issues.push(...this.validateDefinition(item, target, itemPath));
          }
        });
        return issues;
      }
    }
  }
}
