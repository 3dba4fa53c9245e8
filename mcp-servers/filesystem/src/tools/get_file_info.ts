/**
 * get_file_info — Size, timestamps, type and permission bits of a path.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path of the file or directory'),
});

type Params = z.infer<typeof paramsSchema>;

/** Permission bits in octal, e.g. `644` */
export function formatPermissions(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, '0');
}

export function formatFileInfo(stat: Stats): string {
  return [
    `size: ${stat.size}`,
    `created: ${stat.birthtime.toISOString()}`,
    `modified: ${stat.mtime.toISOString()}`,
    `accessed: ${stat.atime.toISOString()}`,
    `isDirectory: ${stat.isDirectory()}`,
    `isFile: ${stat.isFile()}`,
    `permissions: ${formatPermissions(stat.mode)}`,
  ].join('\n');
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const getFileInfo: MCPTool<Params> = {
  name: 'get_file_info',
  description:
    'Retrieve detailed metadata about a file or directory. Returns comprehensive ' +
    'information including size, creation time, last modified time, permissions, ' +
    'and type. This tool is perfect for understanding file characteristics ' +
    'without reading the actual content. Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('get_file_info', params.path, resolved.error);

    try {
      return textResult(formatFileInfo(await fs.stat(resolved.path)));
    } catch (err) {
      return failureResult('get_file_info', params.path, err);
    }
  },
};
