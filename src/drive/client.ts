/**
 * Google Drive API wrapper
 * Uses googleapis library for read-only Drive operations
 */

import type { drive_v3 } from 'googleapis';
import type { FileRecord } from '../types/index.js';
import { renderOrderBy, renderQuery } from './query.js';
import type { DriveQuery, OrderKey } from './query.js';

/**
 * Fields requested for every file
 */
export const FILE_FIELDS =
  'id, name, mimeType, modifiedTime, viewedByMeTime, createdTime, size, parents, webViewLink, owners(displayName, emailAddress), shared, trashed';

export interface ListFilesRequest {
  query: DriveQuery;
  orderBy: OrderKey[];
  pageSize: number;
  pageToken?: string;
}

export interface FilePage {
  files: FileRecord[];
  /** Cursor for the next page, null on the last page */
  nextPageToken: string | null;
}

/**
 * Per-call options
 */
export interface CallOptions {
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
  /** Largest response body accepted for export and download; reading stops past it */
  maxBytes?: number;
}

/**
 * Read-only Drive operations used by the tools
 */
export interface DriveClient {
  listFiles(request: ListFilesRequest, options?: CallOptions): Promise<FilePage>;
  getFile(fileId: string, options?: CallOptions): Promise<FileRecord>;
  exportFile(fileId: string, mimeType: string, options?: CallOptions): Promise<Buffer>;
  downloadFile(fileId: string, options?: CallOptions): Promise<Buffer>;
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseSize(value: string | null | undefined): number | null {
  if (!value) return null;
  const size = Number(value);
  return Number.isFinite(size) ? size : null;
}

/**
 * Converts a Drive API file resource to a FileRecord
 */
export function toFileRecord(file: drive_v3.Schema$File): FileRecord {
  return {
    id: file.id || '',
    name: file.name || 'Untitled',
    mimeType: file.mimeType || 'application/octet-stream',
    modifiedTime: parseDate(file.modifiedTime),
    viewedByMeTime: parseDate(file.viewedByMeTime),
    createdTime: parseDate(file.createdTime),
    size: parseSize(file.size),
    parents: file.parents || [],
    webViewLink: file.webViewLink || null,
    owners: (file.owners || [])
      .map((owner) => owner.displayName || owner.emailAddress || '')
      .filter(Boolean),
    shared: file.shared === true,
    trashed: file.trashed === true,
  };
}

/**
 * Normalizes a media response body to a Buffer
 */
export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  throw new Error(`Unexpected media response body of type ${typeof data}`);
}

/**
 * DriveClient backed by googleapis drive_v3
 */
export class GoogleDriveClient implements DriveClient {
  constructor(private readonly drive: drive_v3.Drive) {}

  async listFiles(request: ListFilesRequest, options: CallOptions = {}): Promise<FilePage> {
    const response = await this.drive.files.list(
      {
        q: renderQuery(request.query),
        orderBy: renderOrderBy(request.orderBy),
        pageSize: request.pageSize,
        pageToken: request.pageToken,
        fields: `nextPageToken, files(${FILE_FIELDS})`,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      },
      { signal: options.signal }
    );

    return {
      files: (response.data.files || []).filter((file) => Boolean(file.id)).map(toFileRecord),
      nextPageToken: response.data.nextPageToken || null,
    };
  }

  async getFile(fileId: string, options: CallOptions = {}): Promise<FileRecord> {
    const response = await this.drive.files.get(
      {
        fileId,
        fields: FILE_FIELDS,
        supportsAllDrives: true,
      },
      { signal: options.signal }
    );
    return toFileRecord(response.data);
  }

  async exportFile(fileId: string, mimeType: string, options: CallOptions = {}): Promise<Buffer> {
    const response = await this.drive.files.export(
      { fileId, mimeType },
      { responseType: 'arraybuffer', signal: options.signal, maxContentLength: options.maxBytes }
    );
    return toBuffer(response.data);
  }

  async downloadFile(fileId: string, options: CallOptions = {}): Promise<Buffer> {
    const response = await this.drive.files.get(
      { fileId, alt: 'media', supportsAllDrives: true },
      { responseType: 'arraybuffer', signal: options.signal, maxContentLength: options.maxBytes }
    );
    return toBuffer(response.data);
  }
}
