/**
 * directory_tree — Recursive JSON view of a directory.
 *
 * Symlinks are reported as files and never followed. Subdirectories that
 * cannot be read are left out of the tree.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';
import { byName } from './list_directory';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Root directory of the tree'),
  max_depth: z
    .number()
    .int()
    .positive()
    .optional()
    .default(3)
    .describe('Number of directory levels to include'),
});

type Params = z.infer<typeof paramsSchema>;

export interface TreeEntry {
  name: string;
  type: 'file' | 'directory';
  children?: TreeEntry[];
}

// ─── Tree Walk ──────────────────────────────────────────────────────────────

/** Entries of `dir`, descending `depth - 1` more levels. Throws if `dir` itself is unreadable. */
export async function buildTree(dir: string, depth: number): Promise<TreeEntry[]> {
  const entries = (await fs.readdir(dir, { withFileTypes: true })).sort(byName);
  const tree: TreeEntry[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      tree.push({ name: entry.name, type: 'file' });
      continue;
    }

    if (depth <= 1) {
      tree.push({ name: entry.name, type: 'directory', children: [] });
      continue;
    }

    try {
      const children = await buildTree(path.join(dir, entry.name), depth - 1);
      tree.push({ name: entry.name, type: 'directory', children });
    } catch {
      // unreadable subdirectory: omitted
      continue;
    }
  }

  return tree;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const directoryTree: MCPTool<Params> = {
  name: 'directory_tree',
  description:
    'Get a recursive tree view of files and directories as a JSON structure. ' +
    "Each entry includes 'name', 'type' (file/directory) and 'children' for directories. " +
    'max_depth limits how many levels are expanded (default 3). ' +
    'The output is formatted with 2-space indentation for readability. ' +
    'Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('directory_tree', params.path, resolved.error);

    try {
      const tree = await buildTree(resolved.path, params.max_depth);
      return textResult(JSON.stringify(tree, null, 2));
    } catch (err) {
      return failureResult('directory_tree', params.path, err);
    }
  },
};
