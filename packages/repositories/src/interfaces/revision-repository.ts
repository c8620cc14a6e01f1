import type {
  Id,
  Revision,
  RevisionSearchFilters,
  SortDirection,
} from '@stafftrail/protocol';

/**
 * Input for appending a revision. The repository assigns the number.
 */
export type AppendRevisionInput = Omit<Revision, 'revisionNumber'>;

export type RevisionSearchCriteria = RevisionSearchFilters & {
  direction: SortDirection;
  limit: number;
  offset: number;
};

export type RevisionSearchResult = {
  items: Revision[];
  total: number;
};

/**
 * Repository interface for the append-only revision history.
 *
 * There is no update or delete: once appended, a revision never changes.
 * Revision numbers are global and strictly increasing; a number handed out
 * to a transaction that later rolls back is never handed out again.
 */
export interface RevisionRepository {
  append(input: AppendRevisionInput): Promise<Revision>;

  /**
   * All revisions of one employee, ascending by revision number.
   */
  list(employeeId: Id): Promise<Revision[]>;

  get(employeeId: Id, revisionNumber: number): Promise<Revision | null>;

  /**
   * The most recent revision of one employee.
   */
  last(employeeId: Id): Promise<Revision | null>;

  /**
   * History projection across employees, ordered by revision number.
   */
  search(criteria: RevisionSearchCriteria): Promise<RevisionSearchResult>;
}
