// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  EmployeeRepository,
  EmployeePatch,
  EmployeeSearchCriteria,
  EmployeeSearchResult,
} from './employee-repository.js';

export type {
  RevisionRepository,
  AppendRevisionInput,
  RevisionSearchCriteria,
  RevisionSearchResult,
} from './revision-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionOptions,
  TransactionalRepositoryContext,
} from './repository-context.js';
