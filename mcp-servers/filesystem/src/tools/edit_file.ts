/**
 * edit_file — Apply text replacements to a file and report a unified diff.
 *
 * Each edit replaces the first exact occurrence of `oldText`. When there is
 * none, a block of lines matching `oldText` line by line (ignoring leading
 * and trailing whitespace) is replaced instead, carrying over the block's
 * indentation. Edits apply in order, each to the result of the previous one.
 * Matching runs on LF text; a file that used CRLF is written back with CRLF.
 * With `dryRun` the file is left untouched.
 */

import * as fs from 'fs/promises';
import { createTwoFilesPatch } from 'diff';
import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { errorResult, failureResult, textResult } from '../../../_shared/ts/mcp-base';

// ─── Params Schema ──────────────────────────────────────────────────────────

const editSchema = z.object({
  oldText: z.string().min(1).describe('Text to search for'),
  newText: z.string().describe('Replacement text'),
});

const paramsSchema = z.object({
  path: z.string().describe('Path of the file to edit'),
  edits: z.array(editSchema).min(1).describe('Replacements, applied in order'),
  dryRun: z.boolean().optional().default(false).describe('Preview the diff without writing'),
});

type Params = z.infer<typeof paramsSchema>;

export type Edit = z.infer<typeof editSchema>;

export type EditOutcome = { ok: true; content: string } | { ok: false; message: string };

// ─── Text Helpers ───────────────────────────────────────────────────────────

export type LineEnding = '\n' | '\r\n';

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n');
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/** Convert LF text back to `ending`. */
export function restoreLineEndings(text: string, ending: LineEnding): string {
  return ending === '\n' ? text : text.replace(/\n/g, ending);
}

function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : '';
}

function findLineBlock(contentLines: readonly string[], oldLines: readonly string[]): number {
  for (let i = 0; i + oldLines.length <= contentLines.length; i++) {
    const matches = oldLines.every((oldLine, j) => oldLine.trim() === contentLines[i + j]?.trim());
    if (matches) return i;
  }
  return -1;
}

/** Re-indent `newText` for a block whose first line carried `baseIndent`. */
function reindent(newText: string, oldLines: readonly string[], baseIndent: string): string[] {
  return newText.split('\n').map((line, j) => {
    if (j === 0) return baseIndent + line.trimStart();
    const oldIndent = leadingWhitespace(oldLines[j] ?? '');
    const newIndent = leadingWhitespace(line);
    const extra = Math.max(0, newIndent.length - oldIndent.length);
    return baseIndent + ' '.repeat(extra) + line.trimStart();
  });
}

/** Apply one edit; exact match first, then the whitespace-tolerant line match. */
export function applyEdit(content: string, edit: Edit): EditOutcome {
  const oldText = normalizeLineEndings(edit.oldText);
  const newText = normalizeLineEndings(edit.newText);

  const index = content.indexOf(oldText);
  if (index !== -1) {
    return { ok: true, content: content.slice(0, index) + newText + content.slice(index + oldText.length) };
  }

  const contentLines = content.split('\n');
  const oldLines = oldText.split('\n');
  const start = findLineBlock(contentLines, oldLines);
  if (start === -1) {
    return { ok: false, message: `could not find exact match for edit:\n${edit.oldText}` };
  }

  const replacement = reindent(newText, oldLines, leadingWhitespace(contentLines[start] ?? ''));
  contentLines.splice(start, oldLines.length, ...replacement);
  return { ok: true, content: contentLines.join('\n') };
}

export function applyEdits(content: string, edits: readonly Edit[]): EditOutcome {
  let current = normalizeLineEndings(content);
  for (const edit of edits) {
    const outcome = applyEdit(current, edit);
    if (!outcome.ok) return outcome;
    current = outcome.content;
  }
  return { ok: true, content: current };
}

/** Unified diff between two versions of `filePath`. */
export function createUnifiedDiff(original: string, modified: string, filePath: string): string {
  return createTwoFilesPatch(
    filePath,
    filePath,
    normalizeLineEndings(original),
    normalizeLineEndings(modified),
    'original',
    'modified',
  );
}

/** Wrap a diff in a ```diff fence longer than any backtick run inside it. */
export function fenceDiff(diff: string): string {
  let fence = '```';
  while (diff.includes(fence)) fence += '`';
  return `${fence}diff\n${diff}${fence}\n\n`;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const editFile: MCPTool<Params> = {
  name: 'edit_file',
  description:
    'Make line-based edits to a text file. Each edit replaces an exact text ' +
    'sequence with new content; when no exact match exists, lines are matched ' +
    'ignoring surrounding whitespace and the original indentation is kept. ' +
    'Returns a git-style diff showing the changes made. Set dryRun to preview ' +
    'without writing. Only works within allowed directories.',
  paramsSchema,

  async execute(params, { sandbox }): Promise<ToolResult> {
    const resolved = await sandbox.resolve(params.path);
    if (!resolved.ok) return failureResult('edit_file', params.path, resolved.error);

    let original: string;
    try {
      original = await fs.readFile(resolved.path, 'utf-8');
    } catch (err) {
      return failureResult('edit_file', params.path, err);
    }

    const outcome = applyEdits(original, params.edits);
    if (!outcome.ok) {
      return errorResult(`edit_file ${params.path}: ${outcome.message}`);
    }

    const modified = restoreLineEndings(outcome.content, detectLineEnding(original));
    const diff = fenceDiff(createUnifiedDiff(original, modified, params.path));
    if (params.dryRun) return textResult(diff);

    try {
      await fs.writeFile(resolved.path, modified, 'utf-8');
    } catch (err) {
      return failureResult('edit_file', params.path, err);
    }
    return textResult(diff);
  },
};
