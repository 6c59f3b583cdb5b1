/**
 * File content retrieval for the assistant
 * Resolves a file ID to UTF-8 text by export or download, within a size budget
 */

import type { FileRecord, Result } from '../types/index.js';
import type { RemoteContext } from './remote.js';
import { callRemote } from './remote.js';
import { resolveRetrievalStrategy } from './mime-types.js';
import { DriveToolError } from '../errors.js';
import { debug } from '../utils/logger.js';

export interface RetrievedContent {
  file: FileRecord;
  text: string;
  /** Export format for Google-native documents, null for downloads */
  exportedAs: string | null;
  /** Size of the retrieved bytes */
  byteLength: number;
}

function formatBytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

function tooLarge(file: FileRecord, bytes: number, maxBytes: number): DriveToolError {
  return new DriveToolError(
    'ContentTooLarge',
    `${file.name} is ${formatBytes(bytes)}, over the ${formatBytes(maxBytes)} content limit; use get_file_metadata instead`
  );
}

/**
 * Decodes bytes as strict UTF-8
 * Invalid sequences and NUL bytes mean the file is not text
 */
export function decodeText(bytes: Buffer): Result<string, DriveToolError> {
  if (bytes.includes(0)) {
    return { ok: false, error: new DriveToolError('DecodeFailure', 'File contains binary data (NUL bytes)') };
  }

  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return { ok: true, value: text };
  } catch (err) {
    return {
      ok: false,
      error: new DriveToolError('DecodeFailure', 'File content is not valid UTF-8 text', { cause: err }),
    };
  }
}

/**
 * Fetches a file's content as text
 *
 * @param fileId - Validated Drive file ID
 * @param maxBytes - Largest content accepted, checked before and after transfer
 */
export async function fetchContent(
  context: RemoteContext,
  fileId: string,
  maxBytes: number
): Promise<Result<RetrievedContent, DriveToolError>> {
  const metadata = await callRemote(context, 'read file metadata', (signal) =>
    context.drive.getFile(fileId, { signal })
  );
  if (!metadata.ok) {
    return metadata;
  }

  const file = metadata.value;
  const strategy = resolveRetrievalStrategy(file.mimeType);
  debug('Resolved retrieval strategy', { module: 'content', fileId, mimeType: file.mimeType, strategy: strategy.kind });

  if (strategy.kind === 'unsupported') {
    return { ok: false, error: new DriveToolError('UnsupportedContentType', strategy.reason) };
  }

  if (file.size !== null && file.size > maxBytes) {
    return { ok: false, error: tooLarge(file, file.size, maxBytes) };
  }

  const bytes =
    strategy.kind === 'export'
      ? await callRemote(context, 'export file', (signal) =>
          context.drive.exportFile(fileId, strategy.exportMimeType, { signal, maxBytes })
        )
      : await callRemote(context, 'download file', (signal) =>
          context.drive.downloadFile(fileId, { signal, maxBytes })
        );
  if (!bytes.ok) {
    return bytes;
  }

  if (bytes.value.length > maxBytes) {
    return { ok: false, error: tooLarge(file, bytes.value.length, maxBytes) };
  }

  const text = decodeText(bytes.value);
  if (!text.ok) {
    return text;
  }

  return {
    ok: true,
    value: {
      file,
      text: text.value,
      exportedAs: strategy.kind === 'export' ? strategy.exportMimeType : null,
      byteLength: bytes.value.length,
    },
  };
}
