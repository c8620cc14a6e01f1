// @stafftrail/runtime
// Versioned employee store: mutations, hierarchy checks, revision history

// Composition
export { createStaffTrail, type StaffTrail, type StaffTrailOptions } from './service.js';

// Mutations
export {
  EmployeeStore,
  type EmployeeStoreOptions,
  type VersionGuard,
} from './store/employee-store.js';

// Reads
export { EmployeeQueryEngine, type EmployeeQueryEngineOptions } from './query/query-engine.js';

// History
export { RevisionLog } from './revisions/revision-log.js';

// Revision context
export {
  captureRevisionContext,
  toRevisionMetadata,
  SYSTEM_REVISION_CONTEXT,
  ANONYMOUS_REVISION_CONTEXT,
  type AmbientContext,
  type CapturedRevisionContext,
} from './context/capture.js';

// Hierarchy
export {
  wouldCreateCycle,
  activeDependentCount,
  supervisionChain,
  type HierarchyView,
} from './hierarchy/validator.js';

// Error types
export {
  StoreError,
  NotFoundError,
  DuplicateKeyError,
  VersionConflictError,
  CycleDetectedError,
  DependentsExistError,
  IntegrityViolationError,
  StorageUnavailableError,
  ValidationError,
  isStoreError,
  translateRepositoryError,
  validated,
  type StoreErrorCode,
} from './errors.js';

export { settle, type StoreResult } from './results.js';

// Configuration
export {
  loadStoreConfig,
  ConfigError,
  DEFAULT_STORE_CONFIG,
  type StoreConfig,
} from './config.js';

// Logging
export {
  LOG_LEVELS,
  consoleLogger,
  silentLogger,
  createLevelLogger,
  createCapturingLogger,
  type LogLevel,
  type LogEntry,
  type StoreLogger,
} from './logging.js';
