import { eq, and, asc, desc, count, gte, lte, type SQL } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { employeeRevisions } from '../schema/index.js';
import type {
  RevisionRepository,
  AppendRevisionInput,
  RevisionSearchCriteria,
  RevisionSearchResult,
} from '../../interfaces/index.js';
import type { Id, Revision } from '@stafftrail/protocol';

type RevisionRow = typeof employeeRevisions.$inferSelect;

export class PgRevisionRepository implements RevisionRepository {
  constructor(private db: DatabaseExecutor) {}

  async append(input: AppendRevisionInput): Promise<Revision> {
    const [row] = await this.db
      .insert(employeeRevisions)
      .values({
        employeeId: input.employeeId,
        kind: input.kind,
        snapshot: input.snapshot,
        actorId: input.metadata.actorId,
        actorRole: input.metadata.actorRole,
        originAddress: input.metadata.originAddress,
        operation: input.metadata.operation,
        committedAt: new Date(input.metadata.committedAt),
      })
      .returning();

    return rowToRevision(row);
  }

  async list(employeeId: Id): Promise<Revision[]> {
    const rows = await this.db
      .select()
      .from(employeeRevisions)
      .where(eq(employeeRevisions.employeeId, employeeId))
      .orderBy(asc(employeeRevisions.revisionNumber));

    return rows.map(rowToRevision);
  }

  async get(employeeId: Id, revisionNumber: number): Promise<Revision | null> {
    const [row] = await this.db
      .select()
      .from(employeeRevisions)
      .where(
        and(
          eq(employeeRevisions.employeeId, employeeId),
          eq(employeeRevisions.revisionNumber, revisionNumber)
        )
      );
    return row ? rowToRevision(row) : null;
  }

  async last(employeeId: Id): Promise<Revision | null> {
    const [row] = await this.db
      .select()
      .from(employeeRevisions)
      .where(eq(employeeRevisions.employeeId, employeeId))
      .orderBy(desc(employeeRevisions.revisionNumber))
      .limit(1);
    return row ? rowToRevision(row) : null;
  }

  async search(criteria: RevisionSearchCriteria): Promise<RevisionSearchResult> {
    const conditions: SQL[] = [];

    if (criteria.employeeId) {
      conditions.push(eq(employeeRevisions.employeeId, criteria.employeeId));
    }

    if (criteria.kind) {
      conditions.push(eq(employeeRevisions.kind, criteria.kind));
    }

    if (criteria.actorId) {
      conditions.push(eq(employeeRevisions.actorId, criteria.actorId));
    }

    if (criteria.committedAfter) {
      conditions.push(gte(employeeRevisions.committedAt, new Date(criteria.committedAfter)));
    }

    if (criteria.committedBefore) {
      conditions.push(lte(employeeRevisions.committedAt, new Date(criteria.committedBefore)));
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const rows = await this.db
      .select()
      .from(employeeRevisions)
      .where(where)
      .orderBy(
        criteria.direction === 'desc'
          ? desc(employeeRevisions.revisionNumber)
          : asc(employeeRevisions.revisionNumber)
      )
      .limit(criteria.limit)
      .offset(criteria.offset);

    const [totals] = await this.db
      .select({ value: count() })
      .from(employeeRevisions)
      .where(where);

    return {
      items: rows.map(rowToRevision),
      total: totals?.value ?? 0,
    };
  }
}

export function rowToRevision(row: RevisionRow): Revision {
  return {
    revisionNumber: row.revisionNumber,
    employeeId: row.employeeId,
    kind: row.kind,
    snapshot: row.snapshot,
    metadata: {
      actorId: row.actorId,
      actorRole: row.actorRole,
      originAddress: row.originAddress,
      operation: row.operation,
      committedAt: row.committedAt.toISOString(),
    },
  };
}
