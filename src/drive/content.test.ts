/**
 * Tests for file content retrieval
 */

import { describe, it, expect } from 'vitest';
import { decodeText, fetchContent } from './content.js';
import type { RemoteContext } from './remote.js';
import type { CallOptions } from './client.js';
import { FakeDriveClient, fileRecord, httpError } from '../testing/fake-drive.js';

const policy = { timeoutMs: 1000, retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1 } };
const MiB = 1024 * 1024;

function contextFor(drive: FakeDriveClient): RemoteContext {
  return { drive, policy };
}

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(Buffer.from('naïve café', 'utf-8'))).toEqual({ ok: true, value: 'naïve café' });
  });

  it('rejects NUL bytes', () => {
    const result = decodeText(Buffer.from([0x68, 0x00, 0x69]));
    expect(!result.ok && result.error.message).toBe('File contains binary data (NUL bytes)');
  });

  it('rejects invalid UTF-8', () => {
    const result = decodeText(Buffer.from([0xc3, 0x28]));
    expect(!result.ok && result.error.kind).toBe('DecodeFailure');
    expect(!result.ok && result.error.message).toBe('File content is not valid UTF-8 text');
  });
});

describe('fetchContent', () => {
  it('exports a Google Doc as plain text', async () => {
    const drive = new FakeDriveClient(
      [fileRecord({ id: 'doc1', name: 'Plan', mimeType: 'application/vnd.google-apps.document' })],
      { doc1: 'Hello' }
    );

    const result = await fetchContent(contextFor(drive), 'doc1', MiB);

    expect(result.ok && result.value).toMatchObject({ text: 'Hello', exportedAs: 'text/plain', byteLength: 5 });
    expect(drive.exportRequests).toEqual([{ fileId: 'doc1', mimeType: 'text/plain' }]);
    expect(drive.calls.downloadFile).toBe(0);
  });

  it('downloads a text upload', async () => {
    const drive = new FakeDriveClient(
      [fileRecord({ id: 'notes', name: 'notes.md', mimeType: 'text/markdown', size: 7 })],
      { notes: '# Notes' }
    );

    const result = await fetchContent(contextFor(drive), 'notes', MiB);

    expect(result.ok && result.value).toMatchObject({ text: '# Notes', exportedAs: null });
    expect(drive.calls.exportFile).toBe(0);
  });

  it('refuses unsupported types without transferring bytes', async () => {
    const drive = new FakeDriveClient([fileRecord({ id: 'img', name: 'photo.png', mimeType: 'image/png' })]);

    const result = await fetchContent(contextFor(drive), 'img', MiB);

    expect(!result.ok && result.error.kind).toBe('UnsupportedContentType');
    expect(drive.calls.downloadFile).toBe(0);
  });

  it('refuses a file whose declared size is over the limit', async () => {
    const drive = new FakeDriveClient([
      fileRecord({ id: 'big', name: 'dump.csv', mimeType: 'text/csv', size: 3 * MiB }),
    ]);

    const result = await fetchContent(contextFor(drive), 'big', 2 * MiB);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'ContentTooLarge',
      message: 'dump.csv is 3.0 MiB, over the 2.0 MiB content limit; use get_file_metadata instead',
    });
    expect(drive.calls.downloadFile).toBe(0);
  });

  it('stops an export at the byte limit while it transfers', async () => {
    const drive = new FakeDriveClient(
      [fileRecord({ id: 'sheet', name: 'Ledger', mimeType: 'application/vnd.google-apps.spreadsheet' })],
      { sheet: 'a,b,c\n1,2,3\n' }
    );

    const result = await fetchContent(contextFor(drive), 'sheet', 4);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'ContentTooLarge',
      message: 'File content is over the size limit, stopped trying to export file',
    });
    expect(drive.calls.exportFile).toBe(1);
  });

  it('refuses a download larger than the limit when the client returns it whole', async () => {
    class UnboundedDrive extends FakeDriveClient {
      override downloadFile(fileId: string, options: CallOptions = {}): Promise<Buffer> {
        return super.downloadFile(fileId, { signal: options.signal });
      }
    }
    const drive = new UnboundedDrive([fileRecord({ id: 'log', name: 'server.log', mimeType: 'text/plain' })], {
      log: 'x'.repeat(10),
    });

    const result = await fetchContent(contextFor(drive), 'log', 4);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'ContentTooLarge',
      message: 'server.log is 0.0 MiB, over the 0.0 MiB content limit; use get_file_metadata instead',
    });
  });

  it('reports binary content as DecodeFailure', async () => {
    const drive = new FakeDriveClient(
      [fileRecord({ id: 'bin', name: 'data.txt', mimeType: 'text/plain' })],
      { bin: Buffer.from([0x00, 0x01, 0x02]) }
    );

    const result = await fetchContent(contextFor(drive), 'bin', MiB);

    expect(!result.ok && result.error.kind).toBe('DecodeFailure');
  });

  it('reports a missing file as NotFound', async () => {
    const result = await fetchContent(contextFor(new FakeDriveClient()), 'missing', MiB);
    expect(!result.ok && result.error.kind).toBe('NotFound');
  });

  it('classifies export failures', async () => {
    const drive = new FakeDriveClient([
      fileRecord({ id: 'doc1', name: 'Plan', mimeType: 'application/vnd.google-apps.document' }),
    ]).failNext('exportFile', httpError(403, ['exportSizeLimitExceeded']));

    const result = await fetchContent(contextFor(drive), 'doc1', MiB);

    expect(!result.ok && result.error.kind).toBe('ContentTooLarge');
  });
});
