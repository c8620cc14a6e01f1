// Employee input validation
//
// Shapes accepted by the store's mutation and search operations.
// Everything is trimmed; email is lower-cased so uniqueness is case-insensitive.

import { z } from 'zod';
import { EMPLOYEE_STATUSES } from '../types/employees.js';
import type {
  EmployeeCandidate,
  EmployeeChanges,
  EmployeeSearchFilters,
} from '../types/employees.js';
import { parseWith, type ParseResult } from './result.js';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const text = (max: number) => z.string().trim().min(1).max(max);

const optionalFilterText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const CalendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a calendar date (YYYY-MM-DD)' });

export const EmailSchema = z.string().trim().toLowerCase().email().max(254);

export const EmployeeStatusSchema = z.enum(EMPLOYEE_STATUSES);

const attributeShape = {
  firstName: text(100),
  lastName: text(100),
  email: EmailSchema,
  phone: text(32).nullable(),
  title: text(100),
  department: text(100),
  salary: z.number().finite().nonnegative(),
  hireDate: CalendarDateSchema,
};

export const EmployeeCandidateSchema = z
  .object({
    ...attributeShape,
    employeeNumber: text(32),
    phone: attributeShape.phone.optional(),
    supervisorId: z.string().min(1).nullable().optional(),
  })
  .strict();

/**
 * Update payload. Unknown keys are rejected, which keeps the business key,
 * version, provenance and status out of ordinary updates.
 */
export const EmployeeChangesSchema = z
  .object({
    firstName: attributeShape.firstName.optional(),
    lastName: attributeShape.lastName.optional(),
    email: attributeShape.email.optional(),
    phone: attributeShape.phone.optional(),
    title: attributeShape.title.optional(),
    department: attributeShape.department.optional(),
    salary: attributeShape.salary.optional(),
    hireDate: attributeShape.hireDate.optional(),
    supervisorId: z.string().min(1).nullable().optional(),
  })
  .strict();

export const EmployeeSearchFiltersSchema = z
  .object({
    firstNameContains: optionalFilterText,
    lastNameContains: optionalFilterText,
    departmentEquals: optionalFilterText,
    statusEquals: EmployeeStatusSchema.optional(),
  })
  .strict();

export function parseEmployeeCandidate(input: unknown): ParseResult<EmployeeCandidate> {
  return parseWith(EmployeeCandidateSchema, input);
}

export function parseEmployeeChanges(input: unknown): ParseResult<EmployeeChanges> {
  return parseWith(EmployeeChangesSchema, input);
}

export function parseEmployeeSearchFilters(input: unknown): ParseResult<EmployeeSearchFilters> {
  return parseWith(EmployeeSearchFiltersSchema, input ?? {});
}
