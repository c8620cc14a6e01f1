// Employee Query Engine
//
// Read side of the store: filtered, sorted, paged employee search, hierarchy
// lookups and history reads. Every call runs in a read-only transaction so a
// multi-step read sees one snapshot. Nothing here writes.

import {
  parseEmployeePageRequest,
  parseEmployeeSearchFilters,
  parseRevisionPageRequest,
  parseRevisionSearchFilters,
  type Employee,
  type EmployeeSearchFilters,
  type EmployeeSortKey,
  type Id,
  type Page,
  type PageRequest,
  type Revision,
  type RevisionSearchFilters,
  type RevisionSortKey,
} from '@stafftrail/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@stafftrail/repositories';
import { DEFAULT_STORE_CONFIG, type StoreConfig } from '../config.js';
import {
  IntegrityViolationError,
  NotFoundError,
  translateRepositoryError,
  validated,
} from '../errors.js';
import { supervisionChain } from '../hierarchy/validator.js';
import { RevisionLog } from '../revisions/revision-log.js';

export type EmployeeQueryEngineOptions = {
  repos: TransactionalRepositoryContext;

  /** Page size limits; defaults apply for anything omitted */
  config?: Partial<Pick<StoreConfig, 'defaultPageSize' | 'maxPageSize'>>;
};

function toPage<T>(
  items: T[],
  total: number,
  request: { pageIndex: number; pageSize: number }
): Page<T> {
  return {
    items,
    total,
    pageIndex: request.pageIndex,
    pageSize: request.pageSize,
    totalPages: Math.ceil(total / request.pageSize),
  };
}

export class EmployeeQueryEngine {
  private repos: TransactionalRepositoryContext;
  private limits: { defaultPageSize: number; maxPageSize: number };

  constructor(options: EmployeeQueryEngineOptions) {
    this.repos = options.repos;
    this.limits = {
      defaultPageSize: options.config?.defaultPageSize ?? DEFAULT_STORE_CONFIG.defaultPageSize,
      maxPageSize: options.config?.maxPageSize ?? DEFAULT_STORE_CONFIG.maxPageSize,
    };
  }

  /**
   * Find employees matching every given filter.
   *
   * Text filters match case-insensitive substrings; department and status
   * match exactly. Equal sort values are ordered by id.
   *
   * @throws ValidationError for unknown filters or an invalid page request
   */
  async search(
    filters: EmployeeSearchFilters = {},
    page: Partial<PageRequest<EmployeeSortKey>> = {}
  ): Promise<Page<Employee>> {
    const criteria = validated(parseEmployeeSearchFilters(filters), 'search filters');
    const request = validated(parseEmployeePageRequest(this.limits, page), 'page request');

    const { items, total } = await this.read((repos) =>
      repos.employees.search({
        ...criteria,
        sortBy: request.sortBy,
        direction: request.direction,
        limit: request.pageSize,
        offset: request.pageIndex * request.pageSize,
      })
    );
    return toPage(items, total, request);
  }

  async get(id: Id): Promise<Employee | null> {
    return this.read((repos) => repos.employees.get(id));
  }

  async getByEmployeeNumber(employeeNumber: string): Promise<Employee | null> {
    return this.read((repos) => repos.employees.getByEmployeeNumber(employeeNumber));
  }

  /**
   * Employees whose supervisor is `id`, in any status, by employee number.
   *
   * @throws NotFoundError if the employee does not exist
   */
  async directReports(id: Id): Promise<Employee[]> {
    return this.read(async (repos) => {
      if (!(await repos.employees.get(id))) {
        throw new NotFoundError('employee', id);
      }
      return repos.employees.listDependents(id);
    });
  }

  /**
   * Supervisors above `id`, nearest first.
   *
   * @throws NotFoundError if the employee does not exist
   * @throws IntegrityViolationError if the stored chain is corrupt
   */
  async reportingChain(id: Id): Promise<Employee[]> {
    return this.read(async (repos) => {
      if (!(await repos.employees.get(id))) {
        throw new NotFoundError('employee', id);
      }

      const chain: Employee[] = [];
      for (const supervisorId of await supervisionChain(repos.employees, id)) {
        const supervisor = await repos.employees.get(supervisorId);
        if (!supervisor) {
          throw new IntegrityViolationError(`Dangling supervisor reference to ${supervisorId}`, {
            startId: id,
            missingId: supervisorId,
          });
        }
        chain.push(supervisor);
      }
      return chain;
    });
  }

  /**
   * Full history of one employee, oldest first. Deleted employees keep
   * their history; unknown ids have none.
   */
  async listRevisions(employeeId: Id): Promise<Revision[]> {
    return this.read((repos) => new RevisionLog(repos.revisions).listRevisions(employeeId));
  }

  async getRevision(employeeId: Id, revisionNumber: number): Promise<Revision | null> {
    return this.read((repos) =>
      new RevisionLog(repos.revisions).getRevision(employeeId, revisionNumber)
    );
  }

  async lastRevision(employeeId: Id): Promise<Revision | null> {
    return this.read((repos) => new RevisionLog(repos.revisions).lastRevision(employeeId));
  }

  /**
   * History across employees, ordered by revision number.
   *
   * @throws ValidationError for unknown filters or an invalid page request
   */
  async searchRevisions(
    filters: RevisionSearchFilters = {},
    page: Partial<PageRequest<RevisionSortKey>> = {}
  ): Promise<Page<Revision>> {
    const criteria = validated(parseRevisionSearchFilters(filters), 'revision filters');
    const request = validated(parseRevisionPageRequest(this.limits, page), 'page request');

    const { items, total } = await this.read((repos) =>
      repos.revisions.search({
        ...criteria,
        direction: request.direction,
        limit: request.pageSize,
        offset: request.pageIndex * request.pageSize,
      })
    );
    return toPage(items, total, request);
  }

  private async read<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
    try {
      return await this.repos.transaction(fn, { readOnly: true });
    } catch (error) {
      throw translateRepositoryError(error);
    }
  }
}
