// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Transactions are serialized: each one runs against a private copy of the
// data, which replaces the shared data only when the function resolves.
// Data does not persist between restarts.

import type { Employee, Id, Revision } from '@stafftrail/protocol';
import { UniqueViolationError } from '../errors.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
  EmployeeRepository,
  EmployeeSearchCriteria,
  RevisionRepository,
  RevisionSearchCriteria,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  employees: Map<Id, Employee>;
  revisions: Revision[];
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to committed data (for debugging/testing) */
  readonly _data: InMemoryDataStore;
  /** Clear all data. Revision numbering is not reset. */
  clear(): void;
}

type Holder = { current: InMemoryDataStore };
type Sequence = { next: number };

function emptyStore(): InMemoryDataStore {
  return { employees: new Map(), revisions: [] };
}

function copyStore(data: InMemoryDataStore): InMemoryDataStore {
  return { employees: new Map(data.employees), revisions: [...data.revisions] };
}

function cloneEmployee(employee: Employee): Employee {
  return { ...employee };
}

function cloneRevision(revision: Revision): Revision {
  return {
    ...revision,
    snapshot: { ...revision.snapshot },
    metadata: { ...revision.metadata },
  };
}

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function containsIgnoringCase(value: string, fragment: string): boolean {
  return value.toLowerCase().includes(fragment.toLowerCase());
}

function createEmployeeRepository(holder: Holder): EmployeeRepository {
  const rows = () => holder.current.employees;

  const findBy = (predicate: (e: Employee) => boolean): Employee | null => {
    for (const employee of rows().values()) {
      if (predicate(employee)) return cloneEmployee(employee);
    }
    return null;
  };

  const assertUnique = (candidate: Employee) => {
    for (const other of rows().values()) {
      if (other.id === candidate.id) continue;
      if (other.employeeNumber === candidate.employeeNumber) {
        throw new UniqueViolationError('employeeNumber');
      }
      if (other.email === candidate.email) {
        throw new UniqueViolationError('email');
      }
    }
  };

  return {
    async insert(employee: Employee): Promise<Employee> {
      assertUnique(employee);
      rows().set(employee.id, cloneEmployee(employee));
      return cloneEmployee(employee);
    },

    async get(id: Id): Promise<Employee | null> {
      const employee = rows().get(id);
      return employee ? cloneEmployee(employee) : null;
    },

    async getByEmployeeNumber(employeeNumber: string): Promise<Employee | null> {
      return findBy((e) => e.employeeNumber === employeeNumber);
    },

    async getByEmail(email: string): Promise<Employee | null> {
      return findBy((e) => e.email === email);
    },

    async compareAndSet(id, expectedVersion, patch): Promise<Employee | null> {
      const existing = rows().get(id);
      if (!existing || existing.version !== expectedVersion) return null;

      const updated: Employee = {
        ...existing,
        firstName: patch.firstName ?? existing.firstName,
        lastName: patch.lastName ?? existing.lastName,
        email: patch.email ?? existing.email,
        phone: patch.phone !== undefined ? patch.phone : existing.phone,
        title: patch.title ?? existing.title,
        department: patch.department ?? existing.department,
        salary: patch.salary ?? existing.salary,
        hireDate: patch.hireDate ?? existing.hireDate,
        status: patch.status ?? existing.status,
        supervisorId:
          patch.supervisorId !== undefined ? patch.supervisorId : existing.supervisorId,
        version: expectedVersion + 1,
        modifiedBy: patch.modifiedBy,
        modifiedAt: patch.modifiedAt,
      };
      assertUnique(updated);
      rows().set(id, updated);
      return cloneEmployee(updated);
    },

    async remove(id: Id, expectedVersion: number): Promise<boolean> {
      const existing = rows().get(id);
      if (!existing || existing.version !== expectedVersion) return false;
      return rows().delete(id);
    },

    async getSupervisorId(id: Id): Promise<Id | null | undefined> {
      return rows().get(id)?.supervisorId;
    },

    async countActiveDependents(id: Id): Promise<number> {
      let total = 0;
      for (const employee of rows().values()) {
        if (employee.supervisorId === id && employee.status === 'ACTIVE') total++;
      }
      return total;
    },

    async listDependents(id: Id): Promise<Employee[]> {
      return Array.from(rows().values())
        .filter((e) => e.supervisorId === id)
        .sort((a, b) => compareValues(a.employeeNumber, b.employeeNumber))
        .map(cloneEmployee);
    },

    async count(): Promise<number> {
      return rows().size;
    },

    async search(criteria: EmployeeSearchCriteria) {
      const matches = Array.from(rows().values()).filter((e) => {
        if (criteria.firstNameContains && !containsIgnoringCase(e.firstName, criteria.firstNameContains)) {
          return false;
        }
        if (criteria.lastNameContains && !containsIgnoringCase(e.lastName, criteria.lastNameContains)) {
          return false;
        }
        if (criteria.departmentEquals && e.department !== criteria.departmentEquals) {
          return false;
        }
        if (criteria.statusEquals && e.status !== criteria.statusEquals) {
          return false;
        }
        return true;
      });

      const sign = criteria.direction === 'desc' ? -1 : 1;
      matches.sort(
        (a, b) =>
          sign * compareValues(a[criteria.sortBy], b[criteria.sortBy]) ||
          compareValues(a.id, b.id)
      );

      return {
        items: matches
          .slice(criteria.offset, criteria.offset + criteria.limit)
          .map(cloneEmployee),
        total: matches.length,
      };
    },
  };
}

function createRevisionRepository(holder: Holder, sequence: Sequence): RevisionRepository {
  const rows = () => holder.current.revisions;
  const forEmployee = (employeeId: Id) => rows().filter((r) => r.employeeId === employeeId);

  return {
    async append(input): Promise<Revision> {
      const revision: Revision = cloneRevision({
        ...input,
        revisionNumber: sequence.next++,
      });
      rows().push(revision);
      return cloneRevision(revision);
    },

    async list(employeeId: Id): Promise<Revision[]> {
      return forEmployee(employeeId).map(cloneRevision);
    },

    async get(employeeId: Id, revisionNumber: number): Promise<Revision | null> {
      const revision = rows().find(
        (r) => r.employeeId === employeeId && r.revisionNumber === revisionNumber
      );
      return revision ? cloneRevision(revision) : null;
    },

    async last(employeeId: Id): Promise<Revision | null> {
      const history = forEmployee(employeeId);
      const revision = history[history.length - 1];
      return revision ? cloneRevision(revision) : null;
    },

    async search(criteria: RevisionSearchCriteria) {
      const after = criteria.committedAfter ? Date.parse(criteria.committedAfter) : undefined;
      const before = criteria.committedBefore ? Date.parse(criteria.committedBefore) : undefined;

      const matches = rows().filter((r) => {
        if (criteria.employeeId && r.employeeId !== criteria.employeeId) return false;
        if (criteria.kind && r.kind !== criteria.kind) return false;
        if (criteria.actorId && r.metadata.actorId !== criteria.actorId) return false;
        const committed = Date.parse(r.metadata.committedAt);
        if (after !== undefined && committed < after) return false;
        if (before !== undefined && committed > before) return false;
        return true;
      });

      if (criteria.direction === 'desc') matches.reverse();

      return {
        items: matches
          .slice(criteria.offset, criteria.offset + criteria.limit)
          .map(cloneRevision),
        total: matches.length,
      };
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const store = new EmployeeStore({ repos });
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const committed: Holder = { current: emptyStore() };
  const sequence: Sequence = { next: 1 };
  let tail: Promise<unknown> = Promise.resolve();

  async function runIsolated<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T> {
    const working: Holder = { current: copyStore(committed.current) };
    const txRepos: RepositoryContext = {
      employees: createEmployeeRepository(working),
      revisions: createRevisionRepository(working, sequence),
    };

    const result = await fn(txRepos);
    if (!options?.readOnly) {
      committed.current = working.current;
    }
    return result;
  }

  function transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T> {
    const run = tail.then(() => runIsolated(fn, options));
    // The next transaction waits for this one to settle either way
    tail = run.catch(() => undefined);
    return run;
  }

  // Reads outside a transaction see committed data. Writes outside one are
  // single-statement transactions queued behind any open transaction, so
  // they must not be issued from inside a transaction function.
  const employeeReads = createEmployeeRepository(committed);
  const employees: EmployeeRepository = {
    ...employeeReads,
    insert: (employee) => transaction((tx) => tx.employees.insert(employee)),
    compareAndSet: (id, expectedVersion, patch) =>
      transaction((tx) => tx.employees.compareAndSet(id, expectedVersion, patch)),
    remove: (id, expectedVersion) =>
      transaction((tx) => tx.employees.remove(id, expectedVersion)),
  };

  const revisionReads = createRevisionRepository(committed, sequence);
  const revisions: RevisionRepository = {
    ...revisionReads,
    append: (input) => transaction((tx) => tx.revisions.append(input)),
  };

  return {
    employees,
    revisions,
    transaction,

    get _data() {
      return committed.current;
    },

    clear() {
      committed.current = emptyStore();
    },
  };
}
