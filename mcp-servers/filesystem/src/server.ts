/**
 * Filesystem MCP server — tool catalogue and server construction.
 */

import { MCPServer, type MCPTool, type ToolContext } from '../../_shared/ts/mcp-base';
import { readFile } from './tools/read_file';
import { readMultipleFiles } from './tools/read_multiple_files';
import { writeFile } from './tools/write_file';
import { editFile } from './tools/edit_file';
import { createDirectory } from './tools/create_directory';
import { listDirectory } from './tools/list_directory';
import { directoryTree } from './tools/directory_tree';
import { moveFile } from './tools/move_file';
import { searchFiles } from './tools/search_files';
import { getFileInfo } from './tools/get_file_info';
import { listAllowedDirectories } from './tools/list_allowed_directories';

export const SERVER_NAME = 'fs-sandbox';
export const SERVER_VERSION = '1.0.0';

/** Catalogue order is the order clients see in `mcp.list_tools`. */
export const FILESYSTEM_TOOLS: MCPTool[] = [
  readFile,
  readMultipleFiles,
  writeFile,
  editFile,
  createDirectory,
  listDirectory,
  directoryTree,
  moveFile,
  searchFiles,
  getFileInfo,
  listAllowedDirectories,
];

export function createFilesystemServer(context: ToolContext): MCPServer {
  return new MCPServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: FILESYSTEM_TOOLS,
    context,
  });
}
