import { searchDrive } from './search_drive.js';
import { listRecentFiles } from './list_recent_files.js';
import { getFileContent } from './get_file_content.js';
import { getFileMetadata } from './get_file_metadata.js';
import { listFolderContents } from './list_folder_contents.js';
import { registerTool } from './types.js';
import type { RegisteredTool } from './types.js';

export type { RegisteredTool, ToolContext, ToolLimits, ToolName } from './types.js';

export const tools: readonly RegisteredTool[] = [
  registerTool(searchDrive),
  registerTool(listRecentFiles),
  registerTool(getFileContent),
  registerTool(getFileMetadata),
  registerTool(listFolderContents),
];
