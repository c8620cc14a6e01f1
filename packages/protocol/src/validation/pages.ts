// Page request validation

import { z } from 'zod';
import type { PageRequest } from '../types/common.js';
import { EMPLOYEE_SORT_KEYS, type EmployeeSortKey } from '../types/employees.js';
import { REVISION_SORT_KEYS, type RevisionSortKey } from '../types/revisions.js';
import { parseWith, type ParseResult } from './result.js';

export type PageLimits = {
  defaultPageSize: number;
  maxPageSize: number;
};

/**
 * Fields shared by every page request. Missing fields take defaults; a page
 * size above `maxPageSize` is capped rather than rejected.
 */
function pageShape(limits: PageLimits) {
  return {
    pageSize: z
      .number()
      .int()
      .positive()
      .transform((size) => Math.min(size, limits.maxPageSize))
      .default(limits.defaultPageSize),
    pageIndex: z.number().int().nonnegative().default(0),
    direction: z.enum(['asc', 'desc']).default('asc'),
  };
}

export function createEmployeePageSchema(limits: PageLimits) {
  return z
    .object({
      ...pageShape(limits),
      sortBy: z.enum(EMPLOYEE_SORT_KEYS).default('employeeNumber'),
    })
    .strict();
}

export function createRevisionPageSchema(limits: PageLimits) {
  return z
    .object({
      ...pageShape(limits),
      sortBy: z.enum(REVISION_SORT_KEYS).default('revisionNumber'),
    })
    .strict();
}

export function parseEmployeePageRequest(
  limits: PageLimits,
  input: unknown
): ParseResult<PageRequest<EmployeeSortKey>> {
  return parseWith(createEmployeePageSchema(limits), input ?? {});
}

export function parseRevisionPageRequest(
  limits: PageLimits,
  input: unknown
): ParseResult<PageRequest<RevisionSortKey>> {
  return parseWith(createRevisionPageSchema(limits), input ?? {});
}
