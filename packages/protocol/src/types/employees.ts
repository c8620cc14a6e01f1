// Employee types - the tracked, self-referential current-state record

import type { CalendarDate, Id, Timestamp } from './common.js';

export const EMPLOYEE_STATUSES = ['ACTIVE', 'INACTIVE', 'TERMINATED'] as const;

/**
 * Lifecycle status of an employee.
 */
export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

/**
 * Descriptive attributes that can change over an employee's lifetime.
 */
export type EmployeeAttributes = {
  firstName: string;
  lastName: string;

  /**
   * Contact identifier. Unique across all employees, stored lower-cased.
   */
  email: string;

  phone: string | null;
  title: string;
  department: string;
  salary: number;
  hireDate: CalendarDate;
};

/**
 * Current state of one employee.
 *
 * `version` starts at 0 on create and increases by exactly 1 per committed
 * mutation. Every committed mutation has a matching Revision.
 */
export type Employee = EmployeeAttributes & {
  id: Id;

  /**
   * Business key. Externally assigned, unique, immutable after creation.
   */
  employeeNumber: string;

  status: EmployeeStatus;

  /**
   * The supervising employee, if any. The supervision graph is a forest.
   */
  supervisorId: Id | null;

  version: number;

  createdBy: string;
  createdAt: Timestamp;
  modifiedBy: string;
  modifiedAt: Timestamp;
};

/**
 * Input for creating an employee. Status is always ACTIVE on create.
 */
export type EmployeeCandidate = Omit<EmployeeAttributes, 'phone'> & {
  employeeNumber: string;
  phone?: string | null;
  supervisorId?: Id | null;
};

/**
 * Changes accepted by an update. Structural and descriptive fields only;
 * status changes go through their own operation.
 */
export type EmployeeChanges = Partial<EmployeeAttributes> & {
  supervisorId?: Id | null;
};

/**
 * Optional predicates for employee search, combined with AND.
 */
export type EmployeeSearchFilters = {
  firstNameContains?: string;
  lastNameContains?: string;
  departmentEquals?: string;
  statusEquals?: EmployeeStatus;
};

export const EMPLOYEE_SORT_KEYS = [
  'employeeNumber',
  'firstName',
  'lastName',
  'department',
  'hireDate',
  'salary',
  'createdAt',
] as const;

export type EmployeeSortKey = (typeof EMPLOYEE_SORT_KEYS)[number];
