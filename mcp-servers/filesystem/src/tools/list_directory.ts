/**
 * list_directory — One line per entry, `[DIR]` or `[FILE]`, sorted by name.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Directory to list'),
});

type Params = z.infer<typeof paramsSchema>;

/** Byte-order name comparison, independent of locale */
export function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const listDirectory: MCPTool<Params> = {
  name: 'list_directory',
  description:
    'Get a detailed listing of all files and directories in a specified path. ' +
    'Results clearly distinguish between files and directories with [FILE] and [DIR] ' +
    'prefixes. Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('list_directory', params.path, resolved.error);

    try {
      const entries = await fs.readdir(resolved.path, { withFileTypes: true });
      const lines = entries
        .sort(byName)
        .map((entry) => `${entry.isDirectory() ? '[DIR]' : '[FILE]'} ${entry.name}`);
      return textResult(lines.join('\n'));
    } catch (err) {
      return failureResult('list_directory', params.path, err);
    }
  },
};
