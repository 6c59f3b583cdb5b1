import type { Result } from '../types/index.js';
import type { Tool } from './types.js';
import { readArgs, requireDriveId } from './arguments.js';
import { callRemote } from '../drive/remote.js';
import { formatMetadata } from '../format/result-formatter.js';

export interface GetFileMetadataInput {
  fileId: string;
}

function parse(raw: unknown): Result<GetFileMetadataInput, string> {
  const args = readArgs(raw, ['fileId']);
  if (!args.ok) return args;

  const fileId = requireDriveId(args.value, 'fileId');
  if (!fileId.ok) return fileId;

  return { ok: true, value: { fileId: fileId.value } };
}

export const getFileMetadata: Tool<GetFileMetadataInput> = {
  name: 'get_file_metadata',
  description:
    'Get metadata for a Google Drive file: name, type, size, dates, link, sharing state, owners and parent folders.',
  inputSchema: {
    type: 'object',
    properties: {
      fileId: {
        type: 'string',
        description: 'ID of the file',
      },
    },
    required: ['fileId'],
    additionalProperties: false,
  },
  parse,
  handler: async (args, context) => {
    const file = await callRemote(context, 'read file metadata', (signal) =>
      context.drive.getFile(args.fileId, { signal })
    );
    if (!file.ok) return file;

    return { ok: true, value: formatMetadata(file.value) };
  },
};
