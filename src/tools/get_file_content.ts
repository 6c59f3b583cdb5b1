import type { Result } from '../types/index.js';
import type { Tool } from './types.js';
import { readArgs, requireDriveId } from './arguments.js';
import { fetchContent } from '../drive/content.js';
import { formatContent } from '../format/result-formatter.js';

export interface GetFileContentInput {
  fileId: string;
}

function parse(raw: unknown): Result<GetFileContentInput, string> {
  const args = readArgs(raw, ['fileId']);
  if (!args.ok) return args;

  const fileId = requireDriveId(args.value, 'fileId');
  if (!fileId.ok) return fileId;

  return { ok: true, value: { fileId: fileId.value } };
}

export const getFileContent: Tool<GetFileContentInput> = {
  name: 'get_file_content',
  description:
    'Read the text content of a Google Drive file. Google Docs and Slides export as plain text, Sheets as CSV; text files are returned as-is. Images, PDFs and other binary files are not supported.',
  inputSchema: {
    type: 'object',
    properties: {
      fileId: {
        type: 'string',
        description: 'ID of the file to read',
      },
    },
    required: ['fileId'],
    additionalProperties: false,
  },
  parse,
  handler: async (args, context) => {
    const content = await fetchContent(context, args.fileId, context.limits.maxContentBytes);
    if (!content.ok) return content;

    return { ok: true, value: formatContent(content.value, context.limits.maxTextBytes) };
  },
};
