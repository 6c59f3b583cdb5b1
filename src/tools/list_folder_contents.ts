import type { Result } from '../types/index.js';
import type { Tool } from './types.js';
import { readArgs, requireDriveId, optionalInteger } from './arguments.js';
import { translateFolder } from '../drive/query.js';
import { runListing } from '../drive/pagination.js';
import { formatFolderListing } from '../format/result-formatter.js';
import { MAX_RESULTS_LIMIT } from '../config.js';

export interface ListFolderContentsInput {
  folderId: string;
  maxResults: number;
}

const DEFAULT_MAX_RESULTS = 50;

function parse(raw: unknown): Result<ListFolderContentsInput, string> {
  const args = readArgs(raw, ['folderId', 'maxResults']);
  if (!args.ok) return args;

  // A missing folderId is an error, never an implicit "root"
  const folderId = requireDriveId(args.value, 'folderId');
  if (!folderId.ok) return folderId;

  const maxResults = optionalInteger(args.value, 'maxResults', 1, MAX_RESULTS_LIMIT, DEFAULT_MAX_RESULTS);
  if (!maxResults.ok) return maxResults;

  return { ok: true, value: { folderId: folderId.value, maxResults: maxResults.value } };
}

export const listFolderContents: Tool<ListFolderContentsInput> = {
  name: 'list_folder_contents',
  description:
    'List files and folders directly inside a Google Drive folder, folders first. Use "root" for the top of My Drive.',
  inputSchema: {
    type: 'object',
    properties: {
      folderId: {
        type: 'string',
        description: 'ID of the folder to list, or "root"',
      },
      maxResults: {
        type: 'integer',
        minimum: 1,
        maximum: MAX_RESULTS_LIMIT,
        description: `Maximum number of entries (default ${DEFAULT_MAX_RESULTS})`,
      },
    },
    required: ['folderId'],
    additionalProperties: false,
  },
  parse,
  handler: async (args, context) => {
    const plan = translateFolder(args.folderId, args.maxResults);
    const listing = await runListing(context, plan, context.limits.maxPagesPerCall);
    if (!listing.ok) return listing;

    return { ok: true, value: formatFolderListing(args.folderId, listing.value.files, listing.value.hasMore) };
  },
};
