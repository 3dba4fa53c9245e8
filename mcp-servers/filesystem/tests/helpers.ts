/**
 * Test helpers for the filesystem MCP server.
 *
 * Temporary directory setup/teardown and tool invocation against a sandbox
 * rooted in that directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Logger } from '../../_shared/ts/logger';
import type { MCPTool, ToolContext, ToolResult } from '../../_shared/ts/mcp-base';
import { resultText } from '../../_shared/ts/mcp-base';
import { PathSandbox } from '../../_shared/ts/sandbox';

/**
 * Create a temporary test directory with optional files. Each file contains
 * `content of <name>` unless given explicit content. Returns the canonical path.
 */
export async function setupTestDir(opts?: {
  files?: string[] | Record<string, string>;
  subdirs?: string[];
}): Promise<string> {
  const testDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'fs-sandbox-test-')));

  for (const subdir of opts?.subdirs ?? []) {
    await fs.mkdir(path.join(testDir, subdir), { recursive: true });
  }

  const files = opts?.files ?? [];
  const entries: Array<[string, string]> = Array.isArray(files)
    ? files.map((file) => [file, `content of ${file}`])
    : Object.entries(files);

  for (const [file, content] of entries) {
    const filePath = path.join(testDir, file);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  return testDir;
}

/** Remove a temporary test directory. */
export async function teardownTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

export function silentLogger(): Logger {
  return new Logger({ silent: true, exit: () => undefined });
}

/** Tool context whose sandbox allows exactly `roots`. */
export async function createContext(roots: string[], startDir?: string): Promise<ToolContext> {
  const sandbox = await PathSandbox.create(roots, { startDir, homeDir: () => undefined });
  return { sandbox, logger: silentLogger() };
}

/** Validate `args` with the tool's schema (applying defaults) and execute. */
export async function invoke<T>(tool: MCPTool<T>, args: unknown, context: ToolContext): Promise<ToolResult> {
  return tool.execute(tool.paramsSchema.parse(args), context);
}

export { resultText };
