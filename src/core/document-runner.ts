import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { ValidationIssue, ValidationResult } from '../types/validation.js';
import type { StructuralValidator } from './structural-validator.js';
import { createIssue, indexPath } from './issues.js';
import { isPlainObject } from './type-check.js';
import { ROOT_ENTITY } from './root-definition.js';

export interface EntryPointPlan {
  /** Key holding the primary entity; the whole document is used when absent. */
  rootKey: string;
  /** Full name of the primary entity's definition. */
  rootDefinition: string;
  /** Array of child links, each validated against `childLinkDefinition`. */
  childLinkKey: string;
  childLinkDefinition: string;
  /** Keys leading from a child link to an embedded primary entity. */
  nestedEntityPath: readonly string[];
}

export interface EntryPoint {
  value: unknown;
  definition: string;
  path: string;
}

export function createEntryPointPlan(rootDefinition: string): EntryPointPlan {
  return {
    rootKey: ROOT_ENTITY,
    rootDefinition,
    childLinkKey: 'CatalogueItemChildItemLink',
    childLinkDefinition: 'CatalogueItemChildItemLink',
    nestedEntityPath: ['CatalogueItem', ROOT_ENTITY],
  };
}

function isFilled(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (value === 0 || value === '') return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

function dig(value: unknown, keys: readonly string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * The (value, definition, path) triples a document is checked through: the
 * primary entity, then every child link followed by the entity it embeds.
 */
export function collectEntryPoints(
  document: unknown,
  plan: EntryPointPlan,
  validator: StructuralValidator,
): EntryPoint[] {
  const root =
    isPlainObject(document) && plan.rootKey in document ? document[plan.rootKey] : document;
  const entryPoints: EntryPoint[] = [
    { value: root, definition: plan.rootDefinition, path: plan.rootKey },
  ];

  const children = isPlainObject(document) ? document[plan.childLinkKey] : undefined;
  const childDefinition = validator.resolve(plan.childLinkDefinition);
  if (!childDefinition || !Array.isArray(children)) return entryPoints;

  children.forEach((child, i) => {
    const linkPath = indexPath(plan.childLinkKey, i);
    entryPoints.push({ value: child, definition: childDefinition.name, path: linkPath });

    const nested = dig(child, plan.nestedEntityPath);
    if (isFilled(nested)) {
      entryPoints.push({
        value: nested,
        definition: plan.rootDefinition,
        path: [linkPath, ...plan.nestedEntityPath].join('.'),
      });
    }
  });
  return entryPoints;
}

export function validateDocument(
  validator: StructuralValidator,
  document: unknown,
  plan: EntryPointPlan,
): ValidationIssue[] {
  return collectEntryPoints(document, plan, validator).flatMap((entry) =>
    validator.validate(entry.value, entry.definition, entry.path),
  );
}

/** Parse and validate one document; unparseable text yields a single PARSE_ERROR. */
export function validateDocumentText(
  validator: StructuralValidator,
  text: string,
  plan: EntryPointPlan,
): ValidationIssue[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    return [createIssue('PARSE_ERROR', '', err instanceof Error ? err.message : String(err))];
  }
  return validateDocument(validator, document, plan);
}

/** Validate files in order, keyed by file name. */
export async function validateFiles(
  validator: StructuralValidator,
  plan: EntryPointPlan,
  files: readonly string[],
): Promise<ValidationResult> {
  const results: ValidationResult = new Map();
  for (const file of files) {
    const text = await readFile(file, 'utf-8');
    results.set(basename(file), validateDocumentText(validator, text, plan));
  }
  return results;
}
