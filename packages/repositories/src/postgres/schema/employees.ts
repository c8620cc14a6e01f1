import {
  pgTable,
  text,
  timestamp,
  integer,
  numeric,
  date,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { EMPLOYEE_STATUSES } from '@stafftrail/protocol';

/**
 * Employees table - current state only.
 *
 * Emails are stored lower-cased, so the plain unique index makes the
 * contact identifier unique case-insensitively. The supervisor reference
 * points back into this table; deleting a referenced row is refused by
 * the foreign key, so dependents are detached first.
 */
export const employees = pgTable(
  'employees',
  {
    id: text('id').primaryKey(),
    employeeNumber: text('employee_number').notNull(),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    email: text('email').notNull(),
    phone: text('phone'),
    title: text('title').notNull(),
    department: text('department').notNull(),
    salary: numeric('salary', { precision: 12, scale: 2 }).notNull(),
    hireDate: date('hire_date', { mode: 'string' }).notNull(),
    status: text('status', { enum: EMPLOYEE_STATUSES }).notNull().default('ACTIVE'),
    supervisorId: text('supervisor_id').references((): AnyPgColumn => employees.id),
    version: integer('version').notNull().default(0),
    createdBy: text('created_by').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    modifiedBy: text('modified_by').notNull(),
    modifiedAt: timestamp('modified_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('employees_employee_number_key').on(table.employeeNumber),
    uniqueIndex('employees_email_key').on(table.email),
    index('employees_supervisor_idx').on(table.supervisorId),
    index('employees_status_idx').on(table.status),
    index('employees_department_idx').on(table.department),
  ]
);
