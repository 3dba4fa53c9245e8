/**
 * create_directory — Create a directory and any missing parents. Idempotent.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';

const paramsSchema = z.object({
  path: z.string().describe('Path of the directory to create'),
});

type Params = z.infer<typeof paramsSchema>;

export const createDirectory: MCPTool<Params> = {
  name: 'create_directory',
  description:
    'Create a new directory or ensure a directory exists. Can create multiple ' +
    'nested directories in one operation. If the directory already exists, ' +
    'this operation will succeed silently. Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('create_directory', params.path, resolved.error);

    try {
      await fs.mkdir(resolved.path, { recursive: true });
      return textResult(`Successfully created directory ${params.path}`);
    } catch (err) {
      return failureResult('create_directory', params.path, err);
    }
  },
};
