/**
 * move_file — Move or rename a file or directory.
 *
 * Both paths pass the sandbox. An existing destination is never replaced.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { errorResult, failureResult, textResult } from '../../../_shared/ts/mcp-base';
import { errnoCode } from '../../../_shared/ts/errors';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  source: z.string().describe('Current path'),
  destination: z.string().describe('New path'),
});

type Params = z.infer<typeof paramsSchema>;

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const moveFile: MCPTool<Params> = {
  name: 'move_file',
  description:
    'Move or rename files and directories. Can move files between directories ' +
    'and rename them in a single operation. If the destination exists, the ' +
    'operation will fail. Works across different directories and can be used ' +
    'for simple renaming within the same directory. Both source and destination ' +
    'must be within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const source = await sandbox.resolve(params.source);
    if (!source.ok) return failureResult('move_file', params.source, source.error);

    const destination = await sandbox.resolve(params.destination);
    if (!destination.ok) return failureResult('move_file', params.destination, destination.error);

    try {
      if (await exists(destination.path)) {
        return errorResult(`move_file ${params.destination}: destination already exists`);
      }
      await fs.mkdir(path.dirname(destination.path), { recursive: true });
      await fs.rename(source.path, destination.path);
      return textResult(`Successfully moved ${params.source} to ${params.destination}`);
    } catch (err) {
      return failureResult('move_file', params.source, err);
    }
  },
};
