/**
 * One configuration problem, keyed by the dotted field path
 */
export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Accumulates issues while a configuration is checked
 */
export interface IssueCollector {
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}

/**
 * Accepted bounds for a numeric setting
 */
export interface NumberRange {
  min: number;
  max: number;
  /** Values outside this pair pass with a warning */
  recommended?: readonly [number, number];
  integer?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}
