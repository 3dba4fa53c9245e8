/**
 * read_multiple_files — Read several files in one call.
 *
 * A failing path is reported inline and never fails the batch.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, ToolContext, ToolResult } from '../../../_shared/ts/mcp-base';
import { textResult } from '../../../_shared/ts/mcp-base';
import { errorMessage } from '../../../_shared/ts/errors';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  paths: z.array(z.string()).describe('Paths of the files to read'),
});

type Params = z.infer<typeof paramsSchema>;

export const ENTRY_SEPARATOR = '\n---\n';

async function readEntry(requested: string, { sandbox }: ToolContext): Promise<string> {
  const resolved = await sandbox.resolve(requested);
  if (!resolved.ok) return `${requested}: Error - ${resolved.error.message}`;

  try {
    const content = await fs.readFile(resolved.path, 'utf-8');
    return `${requested}:\n${content}\n`;
  } catch (err) {
    return `${requested}: Error - ${errorMessage(err)}`;
  }
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const readMultipleFiles: MCPTool<Params> = {
  name: 'read_multiple_files',
  description:
    'Read the contents of multiple files simultaneously. This is more efficient than ' +
    'reading files one by one when you need to analyze or compare several files. ' +
    "Each file's content is returned with its path as a reference. " +
    'Failed reads for individual files do not stop the entire operation. ' +
    'Only works within allowed directories.',
  paramsSchema,

  async execute(params, context): Promise<ToolResult> {
    const entries = await Promise.all(params.paths.map((p) => readEntry(p, context)));
    return textResult(entries.join(ENTRY_SEPARATOR));
  },
};
