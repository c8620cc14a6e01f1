// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Calendar date in YYYY-MM-DD form
 */
export type CalendarDate = string;

export type SortDirection = 'asc' | 'desc';

/**
 * Page request for paginated queries.
 * pageIndex is zero-based.
 */
export type PageRequest<TSortKey extends string> = {
  pageSize: number;
  pageIndex: number;
  sortBy: TSortKey;
  direction: SortDirection;
};

/**
 * One page of results plus the totals needed to navigate the rest.
 */
export type Page<T> = {
  items: T[];
  total: number;
  pageIndex: number;
  pageSize: number;
  totalPages: number;
};
