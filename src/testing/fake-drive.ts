/**
 * In-process DriveClient for tests
 *
 * Evaluates DriveQuery trees and ordering keys over fixture files, paginates
 * with offset cursors, honours maxBytes on content and records every call. Failures can be queued per
 * method, and a method can be made to hang until its signal aborts.
 */

import type { FileRecord } from '../types/index.js';
import type { CallOptions, DriveClient, FilePage, ListFilesRequest } from '../drive/client.js';
import type { OrderKey, QueryClause, QueryTerm } from '../drive/query.js';
import { FOLDER_MIME_TYPE } from '../drive/mime-types.js';

export type FakeDriveMethod = 'listFiles' | 'getFile' | 'exportFile' | 'downloadFile';

/**
 * Builds an error shaped like the ones gaxios throws for HTTP failures
 */
export function httpError(status: number, reasons: string[] = [], message: string = `Request failed with status ${status}`): Error {
  return Object.assign(new Error(message), {
    code: status,
    response: {
      status,
      data: { error: { code: status, message, errors: reasons.map((reason) => ({ reason, message })) } },
    },
  });
}

/**
 * Builds the error node-fetch throws when a body passes maxContentLength
 */
export function contentLimitError(maxBytes: number): Error {
  return Object.assign(new Error(`content size over limit: ${maxBytes}`), { type: 'max-size' });
}

/**
 * FileRecord with defaults for everything but id and name
 */
export function fileRecord(fields: Partial<FileRecord> & { id: string; name: string }): FileRecord {
  return {
    mimeType: 'text/plain',
    modifiedTime: null,
    viewedByMeTime: null,
    createdTime: null,
    size: null,
    parents: [],
    webViewLink: null,
    owners: [],
    shared: false,
    trashed: false,
    ...fields,
  };
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export class FakeDriveClient implements DriveClient {
  readonly calls: Record<FakeDriveMethod, number> = {
    listFiles: 0,
    getFile: 0,
    exportFile: 0,
    downloadFile: 0,
  };
  readonly listRequests: ListFilesRequest[] = [];
  readonly exportRequests: Array<{ fileId: string; mimeType: string }> = [];

  private readonly files: FileRecord[];
  private readonly contents: Map<string, Buffer>;
  private readonly failures: Record<FakeDriveMethod, unknown[]> = {
    listFiles: [],
    getFile: [],
    exportFile: [],
    downloadFile: [],
  };
  private readonly hanging = new Set<FakeDriveMethod>();

  /**
   * @param contents - Bytes returned by export or download, keyed by file ID
   */
  constructor(files: FileRecord[] = [], contents: Record<string, string | Buffer> = {}) {
    this.files = files;
    this.contents = new Map(
      Object.entries(contents).map(([id, value]) => [id, Buffer.isBuffer(value) ? value : Buffer.from(value, 'utf-8')])
    );
  }

  get totalCalls(): number {
    return this.calls.listFiles + this.calls.getFile + this.calls.exportFile + this.calls.downloadFile;
  }

  /**
   * Makes the next call to `method` throw `error`; queued failures are consumed in order
   */
  failNext(method: FakeDriveMethod, error: unknown): this {
    this.failures[method].push(error);
    return this;
  }

  /**
   * Makes every call to `method` wait until its signal aborts
   */
  hang(method: FakeDriveMethod): this {
    this.hanging.add(method);
    return this;
  }

  async listFiles(request: ListFilesRequest, options: CallOptions = {}): Promise<FilePage> {
    await this.enter('listFiles', options);
    this.listRequests.push(request);

    const matching = this.files
      .filter((file) => request.query.allOf.every((clause) => this.matchesClause(file, clause)))
      .sort((a, b) => compareFiles(a, b, request.orderBy));

    const offset = request.pageToken ? Number(request.pageToken) : 0;
    const end = offset + request.pageSize;
    return {
      files: matching.slice(offset, end),
      nextPageToken: end < matching.length ? String(end) : null,
    };
  }

  async getFile(fileId: string, options: CallOptions = {}): Promise<FileRecord> {
    await this.enter('getFile', options);
    return this.find(fileId);
  }

  async exportFile(fileId: string, mimeType: string, options: CallOptions = {}): Promise<Buffer> {
    await this.enter('exportFile', options);
    this.exportRequests.push({ fileId, mimeType });
    return this.content(fileId, options.maxBytes);
  }

  async downloadFile(fileId: string, options: CallOptions = {}): Promise<Buffer> {
    await this.enter('downloadFile', options);
    return this.content(fileId, options.maxBytes);
  }

  private async enter(method: FakeDriveMethod, options: CallOptions): Promise<void> {
    this.calls[method]++;
    if (this.hanging.has(method)) {
      await waitForAbort(options.signal);
    }
    const failure = this.failures[method].shift();
    if (failure !== undefined) {
      throw failure;
    }
  }

  private find(fileId: string): FileRecord {
    const file = this.files.find((f) => f.id === fileId);
    if (!file) {
      throw httpError(404, ['notFound'], `File not found: ${fileId}.`);
    }
    return file;
  }

  private content(fileId: string, maxBytes: number | undefined): Buffer {
    this.find(fileId);
    const bytes = this.contents.get(fileId) ?? Buffer.alloc(0);
    if (maxBytes !== undefined && bytes.length > maxBytes) {
      throw contentLimitError(maxBytes);
    }
    return bytes;
  }

  private matchesClause(file: FileRecord, clause: QueryClause): boolean {
    if (clause.kind === 'anyOf') {
      return clause.terms.some((term) => this.matchesTerm(file, term));
    }
    return this.matchesTerm(file, clause);
  }

  private matchesTerm(file: FileRecord, term: QueryTerm): boolean {
    switch (term.kind) {
      case 'contains': {
        const needle = term.value.toLowerCase();
        if (term.field === 'name') {
          return file.name.toLowerCase().includes(needle);
        }
        const text = this.contents.get(file.id)?.toString('utf-8') ?? '';
        return file.name.toLowerCase().includes(needle) || text.toLowerCase().includes(needle);
      }
      case 'since': {
        const value = file[term.field];
        return value !== null && value.getTime() >= term.value.getTime();
      }
      case 'inParents':
        return file.parents.includes(term.folderId);
      case 'trashed':
        return file.trashed === term.value;
    }
  }
}

function compareKey(a: FileRecord, b: FileRecord, key: OrderKey): number {
  switch (key.field) {
    case 'folder':
      return Number(b.mimeType === FOLDER_MIME_TYPE) - Number(a.mimeType === FOLDER_MIME_TYPE);
    case 'name':
      return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    case 'modifiedTime':
    case 'viewedByMeTime':
      return (a[key.field]?.getTime() ?? 0) - (b[key.field]?.getTime() ?? 0);
  }
}

function compareFiles(a: FileRecord, b: FileRecord, orderBy: OrderKey[]): number {
  for (const key of orderBy) {
    const order = compareKey(a, b, key);
    if (order !== 0) {
      return key.descending ? -order : order;
    }
  }
  return 0;
}
