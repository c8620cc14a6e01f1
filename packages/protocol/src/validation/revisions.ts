// Revision history filter validation

import { z } from 'zod';
import { REVISION_KINDS, type RevisionSearchFilters } from '../types/revisions.js';
import { parseWith, type ParseResult } from './result.js';

export const RevisionSearchFiltersSchema = z
  .object({
    employeeId: z.string().min(1).optional(),
    kind: z.enum(REVISION_KINDS).optional(),
    actorId: z.string().trim().min(1).optional(),
    committedAfter: z.string().datetime({ offset: true }).optional(),
    committedBefore: z.string().datetime({ offset: true }).optional(),
  })
  .strict();

export function parseRevisionSearchFilters(input: unknown): ParseResult<RevisionSearchFilters> {
  return parseWith(RevisionSearchFiltersSchema, input ?? {});
}
