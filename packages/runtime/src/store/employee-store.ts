// Employee Store - the commit boundary
//
// Every employee mutation goes through here. Each one:
// 1. Captures revision context from the caller's ambient attributes
// 2. Opens one repository transaction
// 3. Validates input, uniqueness and hierarchy against that transaction
// 4. Writes current state with a compare-and-set on (id, version)
// 5. Appends the revision through the Revision Log
//
// The current-state write and the revision commit together or not at all.

import {
  EmployeeStatusSchema,
  parseEmployeeCandidate,
  parseEmployeeChanges,
  parseWith,
  toSnapshot,
  type Employee,
  type EmployeeCandidate,
  type EmployeeChanges,
  type EmployeeStatus,
  type Id,
  type RevisionMetadata,
  type RevisionOperation,
  type Timestamp,
} from '@stafftrail/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@stafftrail/repositories';
import {
  CycleDetectedError,
  DependentsExistError,
  DuplicateKeyError,
  IntegrityViolationError,
  NotFoundError,
  StoreError,
  VersionConflictError,
  translateRepositoryError,
  validated,
} from '../errors.js';
import {
  captureRevisionContext,
  toRevisionMetadata,
  type AmbientContext,
} from '../context/capture.js';
import { activeDependentCount, wouldCreateCycle } from '../hierarchy/validator.js';
import { RevisionLog } from '../revisions/revision-log.js';
import { silentLogger, type StoreLogger } from '../logging.js';

export type EmployeeStoreOptions = {
  /** Repository context; every mutation runs in one of its transactions */
  repos: TransactionalRepositoryContext;

  logger?: StoreLogger;

  /** Source of commit timestamps */
  clock?: () => Date;

  /** Source of new employee ids */
  generateId?: () => Id;
};

export type VersionGuard = {
  /** When given, the mutation is refused unless the stored version matches */
  expectedVersion?: number;
};

/**
 * What a mutation body works with inside its transaction.
 */
type MutationScope = {
  repos: RepositoryContext;
  log: RevisionLog;
  actorId: string;
  now: Timestamp;
  metadata(operation: RevisionOperation): RevisionMetadata;
};

/**
 * Mutations of the employee record store.
 *
 * @example
 * ```ts
 * const store = new EmployeeStore({ repos: createInMemoryRepositoryContext() });
 *
 * const created = await store.create(candidate, { 'x-actor-id': 'hr-7' });
 * const updated = await store.update(created.id, created.version, { title: 'Lead' }, ambient);
 * ```
 */
export class EmployeeStore {
  private repos: TransactionalRepositoryContext;
  private logger: StoreLogger;
  private clock: () => Date;
  private generateId: () => Id;

  constructor(options: EmployeeStoreOptions) {
    this.repos = options.repos;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  /**
   * Create an employee at version 0 with status ACTIVE.
   *
   * @throws ValidationError for a malformed candidate
   * @throws DuplicateKeyError if the employee number or email is taken
   * @throws NotFoundError if the supervisor does not exist
   */
  async create(candidate: EmployeeCandidate, ambient?: AmbientContext | null): Promise<Employee> {
    const id = this.generateId();

    return this.mutate('CREATE', id, ambient, async ({ repos, log, actorId, now, metadata }) => {
      const input = validated(parseEmployeeCandidate(candidate), 'employee');

      if (await repos.employees.getByEmployeeNumber(input.employeeNumber)) {
        throw new DuplicateKeyError('employeeNumber', input.employeeNumber);
      }
      if (await repos.employees.getByEmail(input.email)) {
        throw new DuplicateKeyError('email', input.email);
      }

      const supervisorId = input.supervisorId ?? null;
      if (supervisorId !== null && !(await repos.employees.get(supervisorId))) {
        throw new NotFoundError('supervisor', supervisorId);
      }

      const employee = await repos.employees.insert({
        id,
        employeeNumber: input.employeeNumber,
        firstName: input.firstName,
        lastName: input.lastName,
        email: input.email,
        phone: input.phone ?? null,
        title: input.title,
        department: input.department,
        salary: input.salary,
        hireDate: input.hireDate,
        status: 'ACTIVE',
        supervisorId,
        version: 0,
        createdBy: actorId,
        createdAt: now,
        modifiedBy: actorId,
        modifiedAt: now,
      });

      await log.append(id, 'CREATE', toSnapshot(employee), metadata('CREATE'));
      return employee;
    });
  }

  /**
   * Apply descriptive or supervision changes to an employee.
   *
   * @throws ValidationError for unknown or malformed fields, including status
   * @throws NotFoundError if the employee or a new supervisor does not exist
   * @throws VersionConflictError if the stored version is not `expectedVersion`
   * @throws DuplicateKeyError if a changed email belongs to another employee
   * @throws CycleDetectedError if the new supervisor reports to this employee
   */
  async update(
    id: Id,
    expectedVersion: number,
    changes: EmployeeChanges,
    ambient?: AmbientContext | null
  ): Promise<Employee> {
    return this.mutate('UPDATE', id, ambient, async ({ repos, log, actorId, now, metadata }) => {
      const input = validated(parseEmployeeChanges(changes), 'employee changes');

      const existing = await repos.employees.get(id);
      if (!existing) {
        throw new NotFoundError('employee', id);
      }
      if (existing.version !== expectedVersion) {
        throw new VersionConflictError({
          employeeId: id,
          expectedVersion,
          actualVersion: existing.version,
        });
      }

      if (input.email !== undefined && input.email !== existing.email) {
        const holder = await repos.employees.getByEmail(input.email);
        if (holder && holder.id !== id) {
          throw new DuplicateKeyError('email', input.email);
        }
      }

      const supervisorId = input.supervisorId;
      if (
        supervisorId !== undefined &&
        supervisorId !== null &&
        supervisorId !== existing.supervisorId
      ) {
        if (!(await repos.employees.get(supervisorId))) {
          throw new NotFoundError('supervisor', supervisorId);
        }
        if (await wouldCreateCycle(repos.employees, id, supervisorId)) {
          throw new CycleDetectedError(id, supervisorId);
        }
      }

      const updated = await repos.employees.compareAndSet(id, expectedVersion, {
        ...input,
        modifiedBy: actorId,
        modifiedAt: now,
      });
      if (!updated) {
        throw new VersionConflictError({ employeeId: id, expectedVersion });
      }

      await log.append(id, 'UPDATE', toSnapshot(updated), metadata('UPDATE'));
      return updated;
    });
  }

  /**
   * Delete an employee, leaving its history in place.
   *
   * Dependents that are not ACTIVE but still name this employee as their
   * supervisor are detached first, each with its own UPDATE revision.
   *
   * @throws NotFoundError if the employee does not exist
   * @throws VersionConflictError if an expected version is given and differs
   * @throws DependentsExistError if any ACTIVE employee reports to it
   */
  async delete(id: Id, ambient?: AmbientContext | null, options: VersionGuard = {}): Promise<void> {
    await this.mutate('DELETE', id, ambient, async ({ repos, log, actorId, now, metadata }) => {
      const existing = await repos.employees.get(id);
      if (!existing) {
        throw new NotFoundError('employee', id);
      }
      this.checkVersion(existing, options.expectedVersion);

      const active = await activeDependentCount(repos.employees, id);
      if (active > 0) {
        throw new DependentsExistError(id, active);
      }

      for (const dependent of await repos.employees.listDependents(id)) {
        if (dependent.id === id || dependent.status === 'ACTIVE') continue;

        const detached = await repos.employees.compareAndSet(dependent.id, dependent.version, {
          supervisorId: null,
          modifiedBy: actorId,
          modifiedAt: now,
        });
        if (!detached) {
          throw new VersionConflictError({
            employeeId: dependent.id,
            expectedVersion: dependent.version,
          });
        }
        await log.append(
          dependent.id,
          'UPDATE',
          toSnapshot(detached),
          metadata('DETACH_SUPERVISOR')
        );
      }

      if (!(await repos.employees.remove(id, existing.version))) {
        throw new VersionConflictError({ employeeId: id, expectedVersion: existing.version });
      }

      await log.append(id, 'DELETE', toSnapshot(existing), metadata('DELETE'));
    });
  }

  /**
   * Move an employee to another lifecycle status.
   *
   * @throws ValidationError for an unknown status
   * @throws NotFoundError if the employee does not exist
   * @throws VersionConflictError if an expected version is given and differs
   */
  async setStatus(
    id: Id,
    status: EmployeeStatus,
    ambient?: AmbientContext | null,
    options: VersionGuard = {}
  ): Promise<Employee> {
    return this.mutate('SET_STATUS', id, ambient, async ({ repos, log, actorId, now, metadata }) => {
      const nextStatus = validated(parseWith(EmployeeStatusSchema, status), 'status');

      const existing = await repos.employees.get(id);
      if (!existing) {
        throw new NotFoundError('employee', id);
      }
      this.checkVersion(existing, options.expectedVersion);

      const updated = await repos.employees.compareAndSet(id, existing.version, {
        status: nextStatus,
        modifiedBy: actorId,
        modifiedAt: now,
      });
      if (!updated) {
        throw new VersionConflictError({ employeeId: id, expectedVersion: existing.version });
      }

      await log.append(id, 'UPDATE', toSnapshot(updated), metadata('SET_STATUS'));
      return updated;
    });
  }

  private checkVersion(existing: Employee, expectedVersion: number | undefined): void {
    if (expectedVersion !== undefined && existing.version !== expectedVersion) {
      throw new VersionConflictError({
        employeeId: existing.id,
        expectedVersion,
        actualVersion: existing.version,
      });
    }
  }

  /**
   * Run a mutation body in one transaction and report how it ended.
   */
  private async mutate<T>(
    operation: RevisionOperation,
    employeeId: Id,
    ambient: AmbientContext | null | undefined,
    body: (scope: MutationScope) => Promise<T>
  ): Promise<T> {
    const captured = captureRevisionContext(ambient);

    try {
      const result = await this.repos.transaction((repos) => {
        // Read once the transaction is open so commit times follow commit order
        const now = this.clock().toISOString();
        return body({
          repos,
          log: new RevisionLog(repos.revisions),
          actorId: captured.actorId,
          now,
          metadata: (op) => toRevisionMetadata(captured, op, now),
        });
      });

      this.logger.debug('Employee mutation committed', {
        operation,
        employeeId,
        actorId: captured.actorId,
      });
      return result;
    } catch (error) {
      const translated = translateRepositoryError(error, employeeId);

      if (translated instanceof IntegrityViolationError) {
        this.logger.error('Employee hierarchy integrity violation', {
          operation,
          employeeId,
          ...translated.details,
        });
      } else if (translated instanceof StoreError) {
        this.logger.info('Employee mutation rejected', {
          operation,
          employeeId,
          code: translated.code,
          message: translated.message,
        });
      } else {
        this.logger.error('Employee mutation failed', {
          operation,
          employeeId,
          error: translated instanceof Error ? translated.message : String(translated),
        });
      }

      throw translated;
    }
  }
}
