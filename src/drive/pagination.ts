/**
 * Cursor pagination over Drive listings
 * Bounded by the requested result count and a hard page cap
 */

import type { FileRecord, Result } from '../types/index.js';
import type { DriveToolError } from '../errors.js';
import type { FilePage } from './client.js';
import type { ListingPlan } from './query.js';
import type { RemoteContext } from './remote.js';
import { callRemote } from './remote.js';
import { DRIVE_PAGE_SIZE } from '../config.js';
import { debug, warn } from '../utils/logger.js';

export interface PagedFiles {
  files: FileRecord[];
  pagesFetched: number;
  /** More matching files exist beyond what was returned */
  hasMore: boolean;
}

/**
 * Fetches one page given the previous cursor and the page size to request
 */
export type PageFetcher = (
  pageToken: string | undefined,
  pageSize: number
) => Promise<Result<FilePage, DriveToolError>>;

/**
 * Collects pages until enough unique files are gathered, the cursor runs out,
 * a cursor repeats, or maxPages pages have been fetched
 *
 * @param fetchPage - Page fetcher
 * @param maxResults - Number of files wanted
 * @param maxPages - Hard cap on requests for this call
 */
export async function collectPages(
  fetchPage: PageFetcher,
  maxResults: number,
  maxPages: number
): Promise<Result<PagedFiles, DriveToolError>> {
  const files: FileRecord[] = [];
  const seen = new Set<string>();
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;
  let pagesFetched = 0;

  while (pagesFetched < maxPages) {
    const pageSize = Math.min(maxResults - files.length, DRIVE_PAGE_SIZE);
    const result = await fetchPage(pageToken, pageSize);
    if (!result.ok) {
      return result;
    }
    pagesFetched++;

    for (const file of result.value.files) {
      if (seen.has(file.id)) continue;
      seen.add(file.id);
      files.push(file);
    }

    const next = result.value.nextPageToken;
    if (files.length >= maxResults) {
      return {
        ok: true,
        value: { files: files.slice(0, maxResults), pagesFetched, hasMore: files.length > maxResults || next !== null },
      };
    }
    if (next === null) {
      return { ok: true, value: { files, pagesFetched, hasMore: false } };
    }
    if (seenTokens.has(next)) {
      warn('Drive returned a repeated page token, stopping pagination', { module: 'pagination', pagesFetched });
      return { ok: true, value: { files, pagesFetched, hasMore: false } };
    }

    seenTokens.add(next);
    pageToken = next;
  }

  debug('Page cap reached', { module: 'pagination', maxPages, collected: files.length });
  return { ok: true, value: { files, pagesFetched, hasMore: true } };
}

/**
 * Runs a listing plan against Drive
 */
export async function runListing(
  context: RemoteContext,
  plan: ListingPlan,
  maxPages: number
): Promise<Result<PagedFiles, DriveToolError>> {
  const fetchPage: PageFetcher = (pageToken, pageSize) =>
    callRemote(context, 'list files', (signal) =>
      context.drive.listFiles({ query: plan.query, orderBy: plan.orderBy, pageSize, pageToken }, { signal })
    );

  const result = await collectPages(fetchPage, plan.maxResults, maxPages);
  if (result.ok) {
    const { files, pagesFetched, hasMore } = result.value;
    debug('Listing collected', { module: 'pagination', files: files.length, pagesFetched, hasMore });
  }
  return result;
}
