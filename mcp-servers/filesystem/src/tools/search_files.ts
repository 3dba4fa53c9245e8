/**
 * search_files — Recursive, case-insensitive name search.
 *
 * Entries whose path relative to the search root matches an exclude glob
 * are skipped, and excluded directories are not descended into. Entries
 * that cannot be read are skipped. Symlinked directories are not followed.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { failureResult, textResult } from '../../../_shared/ts/mcp-base';
import { byName } from './list_directory';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Directory to search from'),
  pattern: z.string().describe('Case-insensitive substring to look for in entry names'),
  excludePatterns: z
    .array(z.string())
    .optional()
    .default([])
    .describe('Glob patterns (relative to path) to skip'),
});

type Params = z.infer<typeof paramsSchema>;

export const NO_MATCHES = 'No matches found';

// ─── Walk ───────────────────────────────────────────────────────────────────

function isExcluded(relativePath: string, excludePatterns: readonly string[]): boolean {
  return excludePatterns.some((pattern) =>
    minimatch(relativePath, pattern, { dot: true, matchBase: !pattern.includes('/') }),
  );
}

/** Full paths under `root` whose names contain `pattern`, case-insensitively. */
export async function searchTree(
  root: string,
  pattern: string,
  excludePatterns: readonly string[],
): Promise<string[]> {
  const needle = pattern.toLowerCase();
  const results: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries.sort(byName)) {
      const fullPath = path.join(dir, entry.name);
      const relativePath = path.relative(root, fullPath);
      if (isExcluded(relativePath, excludePatterns)) continue;

      if (entry.name.toLowerCase().includes(needle)) {
        results.push(fullPath);
      }
      if (entry.isDirectory()) {
        await walk(fullPath);
      }
    }
  }

  await walk(root);
  return results;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const searchFiles: MCPTool<Params> = {
  name: 'search_files',
  description:
    'Recursively search for files and directories matching a pattern. ' +
    'Searches through all subdirectories from the starting path. The search ' +
    'is case-insensitive and matches partial names. Returns full paths to all ' +
    'matching items. excludePatterns takes glob patterns to skip. ' +
    'Only searches within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('search_files', params.path, resolved.error);

    try {
      const stat = await fs.stat(resolved.path);
      if (!stat.isDirectory()) {
        return failureResult('search_files', params.path, 'not a directory');
      }
      const matches = await searchTree(resolved.path, params.pattern, params.excludePatterns);
      return textResult(matches.length > 0 ? matches.join('\n') : NO_MATCHES);
    } catch (err) {
      return failureResult('search_files', params.path, err);
    }
  },
};
