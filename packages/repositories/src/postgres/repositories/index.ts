// Postgres repository implementations
export { PgEmployeeRepository, rowToEmployee, escapeLikePattern } from './employee-repository.js';
export { PgRevisionRepository, rowToRevision } from './revision-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
