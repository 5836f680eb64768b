export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  checkBoolean,
  checkNonEmptyString,
  checkRange,
  createCollector,
  isRecord
} from './helpers';
export type { ConfigIssue, IssueCollector, NumberRange, ValidationResult } from './types';
