import type { Result } from '../types/index.js';
import type { Tool } from './types.js';
import { readArgs, requireString, optionalInteger } from './arguments.js';
import { translateSearch } from '../drive/query.js';
import { runListing } from '../drive/pagination.js';
import { formatListing } from '../format/result-formatter.js';
import { MAX_RESULTS_LIMIT } from '../config.js';

export interface SearchDriveInput {
  query: string;
  maxResults: number;
}

const DEFAULT_MAX_RESULTS = 20;

function parse(raw: unknown): Result<SearchDriveInput, string> {
  const args = readArgs(raw, ['query', 'maxResults']);
  if (!args.ok) return args;

  const query = requireString(args.value, 'query');
  if (!query.ok) return query;

  const maxResults = optionalInteger(args.value, 'maxResults', 1, MAX_RESULTS_LIMIT, DEFAULT_MAX_RESULTS);
  if (!maxResults.ok) return maxResults;

  return { ok: true, value: { query: query.value.trim(), maxResults: maxResults.value } };
}

export const searchDrive: Tool<SearchDriveInput> = {
  name: 'search_drive',
  description:
    'Search Google Drive for files whose name or content matches the query. Returns id, name, mimeType, modifiedTime and webViewLink, most recently modified first.',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Search terms to find in file names or contents',
      },
      maxResults: {
        type: 'integer',
        minimum: 1,
        maximum: MAX_RESULTS_LIMIT,
        description: `Maximum number of results (default ${DEFAULT_MAX_RESULTS})`,
      },
    },
    required: ['query'],
    additionalProperties: false,
  },
  parse,
  handler: async (args, context) => {
    const plan = translateSearch(args.query, args.maxResults);
    const listing = await runListing(context, plan, context.limits.maxPagesPerCall);
    if (!listing.ok) return listing;

    return {
      ok: true,
      value: formatListing(listing.value.files, {
        hasMore: listing.value.hasMore,
        emptyNote: `No files found matching '${args.query}'`,
        extra: { query: args.query },
      }),
    };
  },
};
