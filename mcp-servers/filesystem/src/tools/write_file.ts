/**
 * write_file — Create or overwrite a file, or append to it.
 *
 * Missing parent directories are created; the sandbox has already checked
 * that the nearest existing ancestor lies inside an allowed root.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path of the file to write'),
  content: z.string().describe('Text content to write'),
  append: z.boolean().optional().default(false).describe('Append instead of overwriting'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export const writeFile: MCPTool<Params> = {
  name: 'write_file',
  description:
    'Create a new file or completely overwrite an existing file with new content. ' +
    'Set append to add to the end of the file instead. ' +
    'Use with caution as it will overwrite existing files without warning. ' +
    'Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('write_file', params.path, resolved.error);

    try {
      await fs.mkdir(path.dirname(resolved.path), { recursive: true });
      if (params.append) {
        await fs.appendFile(resolved.path, params.content, 'utf-8');
        return textResult(`Successfully appended to ${params.path}`);
      }
      await fs.writeFile(resolved.path, params.content, 'utf-8');
      return textResult(`Successfully wrote to ${params.path}`);
    } catch (err) {
      return failureResult('write_file', params.path, err);
    }
  },
};
