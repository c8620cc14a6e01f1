// @stafftrail/protocol
// Data model and input validation shared by the repositories and the runtime.

export * from './types/index.js';

export {
  CalendarDateSchema,
  EmailSchema,
  EmployeeStatusSchema,
  EmployeeCandidateSchema,
  EmployeeChangesSchema,
  EmployeeSearchFiltersSchema,
  parseEmployeeCandidate,
  parseEmployeeChanges,
  parseEmployeeSearchFilters,
} from './validation/employees.js';

export {
  createEmployeePageSchema,
  createRevisionPageSchema,
  parseEmployeePageRequest,
  parseRevisionPageRequest,
  type PageLimits,
} from './validation/pages.js';

export {
  RevisionSearchFiltersSchema,
  parseRevisionSearchFilters,
} from './validation/revisions.js';

export { parseWith, type FieldIssue, type ParseResult } from './validation/result.js';
