import type { FileRecord, RecentMode, Result } from '../types/index.js';
import type { Tool } from './types.js';
import { readArgs, requireInteger, requireEnum, optionalInteger } from './arguments.js';
import { timestampFieldFor, translateRecent } from '../drive/query.js';
import { runListing } from '../drive/pagination.js';
import { formatListing } from '../format/result-formatter.js';
import { MAX_LOOKBACK_HOURS, MAX_RESULTS_LIMIT } from '../config.js';

export interface ListRecentFilesInput {
  hours: number;
  mode: RecentMode;
  maxResults: number;
}

const DEFAULT_MAX_RESULTS = 25;
const MODES: readonly RecentMode[] = ['edited', 'viewed'];

function parse(raw: unknown): Result<ListRecentFilesInput, string> {
  const args = readArgs(raw, ['hours', 'mode', 'maxResults']);
  if (!args.ok) return args;

  const hours = requireInteger(args.value, 'hours', 1, MAX_LOOKBACK_HOURS);
  if (!hours.ok) return hours;

  const mode = requireEnum(args.value, 'mode', MODES);
  if (!mode.ok) return mode;

  const maxResults = optionalInteger(args.value, 'maxResults', 1, MAX_RESULTS_LIMIT, DEFAULT_MAX_RESULTS);
  if (!maxResults.ok) return maxResults;

  return { ok: true, value: { hours: hours.value, mode: mode.value, maxResults: maxResults.value } };
}

/**
 * Newest first on the mode's timestamp; files without one go last
 */
function sortNewestFirst(files: FileRecord[], mode: RecentMode): FileRecord[] {
  const field = timestampFieldFor(mode);
  return [...files].sort((a, b) => (b[field]?.getTime() ?? 0) - (a[field]?.getTime() ?? 0));
}

export const listRecentFiles: Tool<ListRecentFilesInput> = {
  name: 'list_recent_files',
  description:
    'List files you edited or viewed in Google Drive within the last N hours, most recent first.',
  inputSchema: {
    type: 'object',
    properties: {
      hours: {
        type: 'integer',
        minimum: 1,
        maximum: MAX_LOOKBACK_HOURS,
        description: 'Number of hours to look back',
      },
      mode: {
        type: 'string',
        enum: [...MODES],
        description: '"edited" filters on last modification, "viewed" on your last view',
      },
      maxResults: {
        type: 'integer',
        minimum: 1,
        maximum: MAX_RESULTS_LIMIT,
        description: `Maximum number of results (default ${DEFAULT_MAX_RESULTS})`,
      },
    },
    required: ['hours', 'mode'],
    additionalProperties: false,
  },
  parse,
  handler: async (args, context) => {
    const plan = translateRecent(args.hours, args.mode, args.maxResults, context.now());
    const listing = await runListing(context, plan, context.limits.maxPagesPerCall);
    if (!listing.ok) return listing;

    return {
      ok: true,
      value: formatListing(sortNewestFirst(listing.value.files, args.mode), {
        hasMore: listing.value.hasMore,
        emptyNote: `No files ${args.mode} in the last ${args.hours} hours`,
        includeViewedTime: args.mode === 'viewed',
        extra: { hours: args.hours, mode: args.mode },
      }),
    };
  },
};
