export type IssueCategory =
  | 'SCHEMA_NOT_FOUND'
  | 'UNKNOWN_FIELD'
  | 'TYPE_MISMATCH'
  | 'INVALID_ENUM'
  | 'PARSE_ERROR';

export interface ValidationIssue {
  category: IssueCategory;
  path: string;
  message: string;
}

/** Issues per document identifier, in document order. Empty list means valid. */
export type ValidationResult = Map<string, ValidationIssue[]>;

export interface IssuePatternCount {
  pattern: string;
  count: number;
}
