// Revision types - the append-only history of employee mutations

import type { CalendarDate, Id, Timestamp } from './common.js';
import type { Employee, EmployeeStatus } from './employees.js';

export const REVISION_KINDS = ['CREATE', 'UPDATE', 'DELETE'] as const;

export type RevisionKind = (typeof REVISION_KINDS)[number];

export const REVISION_OPERATIONS = [
  'CREATE',
  'UPDATE',
  'SET_STATUS',
  'DELETE',
  'DETACH_SUPERVISOR',
] as const;

/**
 * The verb that triggered a revision. Independent of any transport method.
 */
export type RevisionOperation = (typeof REVISION_OPERATIONS)[number];

/**
 * Full state of an employee as of one commit.
 *
 * Defined on its own rather than derived from Employee, so that adding a
 * current-state field never changes what history records.
 */
export type EmployeeSnapshot = {
  employeeNumber: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  title: string;
  department: string;
  salary: number;
  hireDate: CalendarDate;
  status: EmployeeStatus;
  supervisorId: Id | null;
  version: number;
  createdBy: string;
  createdAt: Timestamp;
  modifiedBy: string;
  modifiedAt: Timestamp;
};

/**
 * Who committed a revision, from where, and through which operation.
 */
export type RevisionMetadata = {
  actorId: string;
  actorRole: string;
  originAddress: string;
  operation: RevisionOperation;
  committedAt: Timestamp;
};

/**
 * An immutable record of one committed mutation.
 */
export type Revision = {
  /**
   * Global, strictly increasing, never reused.
   */
  revisionNumber: number;
  employeeId: Id;
  kind: RevisionKind;
  snapshot: EmployeeSnapshot;
  metadata: RevisionMetadata;
};

/**
 * Filter for history projections.
 */
export type RevisionSearchFilters = {
  employeeId?: Id;
  kind?: RevisionKind;
  actorId?: string;
  committedAfter?: Timestamp;
  committedBefore?: Timestamp;
};

export const REVISION_SORT_KEYS = ['revisionNumber'] as const;

export type RevisionSortKey = (typeof REVISION_SORT_KEYS)[number];

/**
 * Copy the recorded fields out of an employee.
 */
export function toSnapshot(employee: Employee): EmployeeSnapshot {
  return {
    employeeNumber: employee.employeeNumber,
    firstName: employee.firstName,
    lastName: employee.lastName,
    email: employee.email,
    phone: employee.phone,
    title: employee.title,
    department: employee.department,
    salary: employee.salary,
    hireDate: employee.hireDate,
    status: employee.status,
    supervisorId: employee.supervisorId,
    version: employee.version,
    createdBy: employee.createdBy,
    createdAt: employee.createdAt,
    modifiedBy: employee.modifiedBy,
    modifiedAt: employee.modifiedAt,
  };
}
