/**
 * read_file — Read the complete contents of a file as UTF-8 text.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path of the file to read'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export const readFile: MCPTool<Params> = {
  name: 'read_file',
  description:
    'Read the complete contents of a file from the file system. ' +
    'Use this to examine the contents of a single file. ' +
    'Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('read_file', params.path, resolved.error);

    try {
      return textResult(await fs.readFile(resolved.path, 'utf-8'));
    } catch (err) {
      return failureResult('read_file', params.path, err);
    }
  },
};
