import { isDeepStrictEqual } from 'node:util';
import type { JsonValue } from '../types/swagger.js';
import type {
  IssueCategory,
  IssuePatternCount,
  ValidationIssue,
  ValidationResult,
} from '../types/validation.js';

const ENUM_PREVIEW_LENGTH = 6;
const ARRAY_INDEX = /\[\d+\]/g;

export function createIssue(
  category: IssueCategory,
  path: string,
  message: string,
): ValidationIssue {
  return Object.freeze({ category, path, message });
}

/** Replace numeric array indices with `[*]` so repeated issues group together. */
export function normalizePath(path: string): string {
  return path.replace(ARRAY_INDEX, '[*]');
}

export function formatIssue(issue: ValidationIssue): string {
  return `${issue.category} ${issue.path}: ${issue.message}`;
}

export function issuePattern(issue: ValidationIssue): string {
  return `${issue.category} ${normalizePath(issue.path)}: ${issue.message}`;
}

export function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  return JSON.stringify(value) ?? String(value);
}

/** `['A', 'B', ...]`, showing at most the first six allowed values. */
export function formatAllowedValues(values: readonly JsonValue[]): string {
  const shown = values.slice(0, ENUM_PREVIEW_LENGTH).map(formatValue);
  if (values.length > ENUM_PREVIEW_LENGTH) shown.push('...');
  return `[${shown.join(', ')}]`;
}

export function isEnumMember(value: unknown, allowed: readonly JsonValue[]): boolean {
  // JSON numbers compare by value, so -0 matches 0
  return allowed.some(
    (candidate) => candidate === value || isDeepStrictEqual(candidate, value),
  );
}

export function invalidEnumIssue(
  path: string,
  value: unknown,
  allowed: readonly JsonValue[],
): ValidationIssue {
  return createIssue(
    'INVALID_ENUM',
    path,
    `${formatValue(value)} not in ${formatAllowedValues(allowed)}`,
  );
}

export function hasIssues(result: ValidationResult): boolean {
  for (const issues of result.values()) {
    if (issues.length > 0) return true;
  }
  return false;
}

/**
 * Count how many documents hit each issue pattern. A pattern counts once per
 * document; ties keep first-seen order.
 */
export function aggregateIssuePatterns(
  result: ValidationResult,
  limit = 50,
): IssuePatternCount[] {
  const counts = new Map<string, number>();
  for (const issues of result.values()) {
    const seen = new Set<string>();
    for (const issue of issues) {
      const pattern = issuePattern(issue);
      if (seen.has(pattern)) continue;
      seen.add(pattern);
      counts.set(pattern, (counts.get(pattern) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([pattern, count]) => ({ pattern, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}
