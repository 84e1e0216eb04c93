import type { IssueCategory, IssuePatternCount, ValidationResult } from '../types/validation.js';
import { aggregateIssuePatterns, normalizePath } from './issues.js';

export interface ReportedIssue {
  category: IssueCategory;
  path: string;
  normalizedPath: string;
  message: string;
}

export interface DocumentReport {
  file: string;
  valid: boolean;
  issues: ReportedIssue[];
}

export interface SourceReport {
  source: string;
  label: string;
  definitions: number;
  rootDefinition: string;
  rootProperties: number;
  files: number;
  valid: number;
  withIssues: number;
  documents: DocumentReport[];
  patterns: IssuePatternCount[];
}

export interface SourceContext {
  source: string;
  label: string;
  definitions: number;
  rootDefinition: string;
  rootProperties: number;
}

export function buildSourceReport(
  context: SourceContext,
  results: ValidationResult,
  patternLimit = 50,
): SourceReport {
  const documents: DocumentReport[] = [...results.entries()].map(([file, issues]) => ({
    file,
    valid: issues.length === 0,
    issues: issues.map((issue) => ({
      category: issue.category,
      path: issue.path,
      normalizedPath: normalizePath(issue.path),
      message: issue.message,
    })),
  }));
  const valid = documents.filter((d) => d.valid).length;

  return {
    ...context,
    files: documents.length,
    valid,
    withIssues: documents.length - valid,
    documents,
    patterns: aggregateIssuePatterns(results, patternLimit),
  };
}

export function sourcePassed(report: SourceReport): boolean {
  return report.withIssues === 0;
}
