import type {
  Id,
  Employee,
  EmployeeAttributes,
  EmployeeSearchFilters,
  EmployeeSortKey,
  EmployeeStatus,
  SortDirection,
  Timestamp,
} from '@stafftrail/protocol';

/**
 * Fields written by a compare-and-set. Version is not part of the patch:
 * a successful compare-and-set always stores expectedVersion + 1.
 */
export type EmployeePatch = Partial<EmployeeAttributes> & {
  supervisorId?: Id | null;
  status?: EmployeeStatus;
  modifiedBy: string;
  modifiedAt: Timestamp;
};

/**
 * Filters, ordering and window for an employee search.
 * Rows with equal sort values are ordered by id ascending.
 */
export type EmployeeSearchCriteria = EmployeeSearchFilters & {
  sortBy: EmployeeSortKey;
  direction: SortDirection;
  limit: number;
  offset: number;
};

export type EmployeeSearchResult = {
  items: Employee[];
  total: number;
};

/**
 * Repository interface for the current-state employee table.
 *
 * Implementations do no validation beyond what the storage enforces
 * (unique employee number and email). Uniqueness collisions surface as
 * UniqueViolationError. Callers that need consistent multi-step reads
 * run these methods inside a transaction.
 */
export interface EmployeeRepository {
  /**
   * Insert a fully formed employee row.
   */
  insert(employee: Employee): Promise<Employee>;

  /**
   * Get an employee by ID
   * @returns Employee or null if not found
   */
  get(id: Id): Promise<Employee | null>;

  getByEmployeeNumber(employeeNumber: string): Promise<Employee | null>;

  /**
   * Look up by contact identifier. Expects an already lower-cased email.
   */
  getByEmail(email: string): Promise<Employee | null>;

  /**
   * Apply a patch only if the stored version equals expectedVersion.
   * @returns The updated employee, or null if no row matched
   */
  compareAndSet(id: Id, expectedVersion: number, patch: EmployeePatch): Promise<Employee | null>;

  /**
   * Remove the row only if the stored version equals expectedVersion.
   * @returns Whether a row was removed
   */
  remove(id: Id, expectedVersion: number): Promise<boolean>;

  /**
   * @returns The supervisor reference, or undefined if the employee does not exist
   */
  getSupervisorId(id: Id): Promise<Id | null | undefined>;

  countActiveDependents(id: Id): Promise<number>;

  /**
   * Direct dependents in any status, ordered by employee number.
   */
  listDependents(id: Id): Promise<Employee[]>;

  /**
   * Total number of employees.
   */
  count(): Promise<number>;

  search(criteria: EmployeeSearchCriteria): Promise<EmployeeSearchResult>;
}
