/**
 * Translation of tool arguments into Drive API v3 queries
 *
 * Queries are built as a small typed tree and rendered to Drive's `q` syntax
 * by renderQuery(). User-supplied values only ever appear inside quoted
 * string literals produced by escapeQueryValue().
 */

import type { RecentMode } from '../types/index.js';

export type TimestampField = 'modifiedTime' | 'viewedByMeTime';

export type QueryTerm =
  | { kind: 'contains'; field: 'name' | 'fullText'; value: string }
  | { kind: 'since'; field: TimestampField; value: Date }
  | { kind: 'inParents'; folderId: string }
  | { kind: 'trashed'; value: boolean };

export type QueryClause = QueryTerm | { kind: 'anyOf'; terms: QueryTerm[] };

/**
 * Conjunction of clauses
 */
export interface DriveQuery {
  allOf: QueryClause[];
}

export interface OrderKey {
  field: TimestampField | 'folder' | 'name';
  descending?: boolean;
}

/**
 * Everything needed to run a paginated listing
 */
export interface ListingPlan {
  query: DriveQuery;
  orderBy: OrderKey[];
  maxResults: number;
}

/** Drive IDs use the URL-safe base64 alphabet */
const DRIVE_ID_PATTERN = /^[A-Za-z0-9_-]{1,256}$/;

/**
 * Checks that a value looks like a Drive file or folder ID
 * The `root` alias for My Drive passes, since it is in the same alphabet
 */
export function isValidDriveId(id: string): boolean {
  return DRIVE_ID_PATTERN.test(id);
}

/**
 * Escapes a value for use inside a single-quoted Drive query literal
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Formats a timestamp the way Drive query examples do (RFC 3339, UTC, no millis)
 */
export function formatQueryTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, '');
}

function renderTerm(term: QueryTerm): string {
  switch (term.kind) {
    case 'contains':
      return `${term.field} contains '${escapeQueryValue(term.value)}'`;
    case 'since':
      return `${term.field} >= '${formatQueryTimestamp(term.value)}'`;
    case 'inParents':
      return `'${escapeQueryValue(term.folderId)}' in parents`;
    case 'trashed':
      return `trashed = ${term.value}`;
  }
}

/**
 * Renders a query tree to Drive's `q` parameter
 */
export function renderQuery(query: DriveQuery): string {
  return query.allOf
    .map((clause) =>
      clause.kind === 'anyOf' ? `(${clause.terms.map(renderTerm).join(' or ')})` : renderTerm(clause)
    )
    .join(' and ');
}

/**
 * Renders ordering keys to Drive's `orderBy` parameter
 */
export function renderOrderBy(orderBy: OrderKey[]): string {
  return orderBy.map((key) => (key.descending ? `${key.field} desc` : key.field)).join(',');
}

/**
 * Full-text search over file names and indexed content
 *
 * @param term - Non-empty search term (validated by the tool)
 */
export function translateSearch(term: string, maxResults: number): ListingPlan {
  return {
    query: {
      allOf: [
        {
          kind: 'anyOf',
          terms: [
            { kind: 'contains', field: 'name', value: term },
            { kind: 'contains', field: 'fullText', value: term },
          ],
        },
        { kind: 'trashed', value: false },
      ],
    },
    orderBy: [{ field: 'modifiedTime', descending: true }],
    maxResults,
  };
}

/**
 * Timestamp field a recency listing filters and orders on
 */
export function timestampFieldFor(mode: RecentMode): TimestampField {
  return mode === 'edited' ? 'modifiedTime' : 'viewedByMeTime';
}

/**
 * Files edited or viewed within the last `hours`, newest first
 *
 * @param now - Moment the cutoff is computed from
 */
export function translateRecent(hours: number, mode: RecentMode, maxResults: number, now: Date): ListingPlan {
  const field = timestampFieldFor(mode);
  const cutoff = new Date(now.getTime() - hours * 60 * 60 * 1000);

  return {
    query: {
      allOf: [
        { kind: 'since', field, value: cutoff },
        { kind: 'trashed', value: false },
      ],
    },
    orderBy: [{ field, descending: true }],
    maxResults,
  };
}

/**
 * Direct children of a folder, folders first then by name
 *
 * @param folderId - Validated Drive folder ID (never defaulted to root)
 */
export function translateFolder(folderId: string, maxResults: number): ListingPlan {
  return {
    query: {
      allOf: [
        { kind: 'inParents', folderId },
        { kind: 'trashed', value: false },
      ],
    },
    orderBy: [{ field: 'folder' }, { field: 'name' }],
    maxResults,
  };
}
