/**
 * Shapes Drive records into assistant-facing tool results
 */

import type { DataBlock, ErrorKind, FileRecord, TextBlock, ToolResult } from '../types/index.js';
import type { RetrievedContent } from '../drive/content.js';
import { FOLDER_MIME_TYPE } from '../drive/mime-types.js';

export interface ListingEntry {
  id: string;
  name: string;
  mimeType: string;
  modifiedTime: string | null;
  viewedByMeTime?: string | null;
  webViewLink: string | null;
}

export interface MetadataEntry {
  id: string;
  name: string;
  mimeType: string;
  size: number | null;
  createdTime: string | null;
  modifiedTime: string | null;
  viewedByMeTime: string | null;
  webViewLink: string | null;
  shared: boolean;
  owners: string[];
  parents: string[];
}

export interface TruncatedText {
  text: string;
  truncated: boolean;
  totalBytes: number;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Listing projection (no content, no sharing details)
 */
export function toListingEntry(file: FileRecord, includeViewedTime: boolean = false): ListingEntry {
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType,
    modifiedTime: iso(file.modifiedTime),
    ...(includeViewedTime ? { viewedByMeTime: iso(file.viewedByMeTime) } : {}),
    webViewLink: file.webViewLink,
  };
}

export function toMetadataEntry(file: FileRecord): MetadataEntry {
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType,
    size: file.size,
    createdTime: iso(file.createdTime),
    modifiedTime: iso(file.modifiedTime),
    viewedByMeTime: iso(file.viewedByMeTime),
    webViewLink: file.webViewLink,
    shared: file.shared,
    owners: file.owners,
    parents: file.parents,
  };
}

/**
 * Cuts text to at most maxBytes of UTF-8 without splitting a character
 * and appends a truncation marker
 */
export function truncateText(text: string, maxBytes: number): TruncatedText {
  const bytes = Buffer.from(text, 'utf-8');
  if (bytes.length <= maxBytes) {
    return { text, truncated: false, totalBytes: bytes.length };
  }

  let cut = maxBytes;
  // Back off over UTF-8 continuation bytes (10xxxxxx)
  while (cut > 0 && (bytes[cut] & 0xc0) === 0x80) {
    cut--;
  }

  const head = bytes.subarray(0, cut).toString('utf-8');
  return {
    text: `${head}\n\n[... truncated: showing ${cut} of ${bytes.length} bytes]`,
    truncated: true,
    totalBytes: bytes.length,
  };
}

function data(payload: Record<string, unknown>): DataBlock {
  return { type: 'data', data: payload };
}

function text(value: string): TextBlock {
  return { type: 'text', text: value };
}

/**
 * Empty result sets are not errors: zero blocks and an explanatory note
 */
export function formatEmpty(note: string): ToolResult {
  return { isError: false, content: [], note };
}

/**
 * Flat listing (search, recent files)
 */
export function formatListing(
  files: FileRecord[],
  options: { hasMore: boolean; emptyNote: string; includeViewedTime?: boolean; extra?: Record<string, unknown> }
): ToolResult {
  if (files.length === 0) {
    return formatEmpty(options.emptyNote);
  }

  return {
    isError: false,
    content: [
      data({
        ...options.extra,
        count: files.length,
        hasMore: options.hasMore,
        files: files.map((file) => toListingEntry(file, options.includeViewedTime)),
      }),
    ],
  };
}

/**
 * Folder listing, split into sub-folders and files
 */
export function formatFolderListing(folderId: string, entries: FileRecord[], hasMore: boolean): ToolResult {
  if (entries.length === 0) {
    return formatEmpty(`Folder ${folderId} is empty`);
  }

  const folders = entries.filter((entry) => entry.mimeType === FOLDER_MIME_TYPE);
  const files = entries.filter((entry) => entry.mimeType !== FOLDER_MIME_TYPE);

  return {
    isError: false,
    content: [
      data({
        folderId,
        folderCount: folders.length,
        fileCount: files.length,
        hasMore,
        folders: folders.map((folder) => toListingEntry(folder)),
        files: files.map((file) => toListingEntry(file)),
      }),
    ],
  };
}

export function formatMetadata(file: FileRecord): ToolResult {
  return { isError: false, content: [data({ ...toMetadataEntry(file) })] };
}

/**
 * File content: a short header block and the (possibly truncated) text
 */
export function formatContent(content: RetrievedContent, maxTextBytes: number): ToolResult {
  const truncated = truncateText(content.text, maxTextBytes);

  return {
    isError: false,
    content: [
      data({
        id: content.file.id,
        name: content.file.name,
        mimeType: content.file.mimeType,
        exportedAs: content.exportedAs,
        byteLength: content.byteLength,
        truncated: truncated.truncated,
      }),
      text(truncated.text),
    ],
  };
}

export function formatError(kind: ErrorKind, message: string): ToolResult {
  return { isError: true, content: [{ type: 'error', kind, message }] };
}
