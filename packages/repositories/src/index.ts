// @stafftrail/repositories
// Repository interfaces and implementations for substrate-independent data access.
//
// This package defines the "contract" for data operations. The actual
// implementations (Postgres, in-memory) fulfill these contracts, allowing the
// runtime to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - TransactionalRepositoryContext is the atomic-commit boundary

export * from './interfaces/index.js';
export * from './errors.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
