import { pgTable, text, timestamp, jsonb, bigint, index } from 'drizzle-orm/pg-core';
import { REVISION_KINDS, REVISION_OPERATIONS } from '@stafftrail/protocol';
import type { EmployeeSnapshot } from '@stafftrail/protocol';

/**
 * Employee revisions table - append-only history.
 *
 * No foreign key to employees: a DELETE revision and everything before it
 * outlive the current-state row. The identity column hands out each
 * revision number once, rolled back or not.
 */
export const employeeRevisions = pgTable(
  'employee_revisions',
  {
    revisionNumber: bigint('revision_number', { mode: 'number' })
      .primaryKey()
      .generatedAlwaysAsIdentity(),
    employeeId: text('employee_id').notNull(),
    kind: text('kind', { enum: REVISION_KINDS }).notNull(),
    snapshot: jsonb('snapshot').$type<EmployeeSnapshot>().notNull(),
    actorId: text('actor_id').notNull(),
    actorRole: text('actor_role').notNull(),
    originAddress: text('origin_address').notNull(),
    operation: text('operation', { enum: REVISION_OPERATIONS }).notNull(),
    committedAt: timestamp('committed_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('employee_revisions_employee_idx').on(table.employeeId, table.revisionNumber),
    index('employee_revisions_actor_idx').on(table.actorId),
    index('employee_revisions_committed_idx').on(table.committedAt),
  ]
);
