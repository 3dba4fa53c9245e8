/**
 * Test helpers for the shared server modules.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../ts/logger';
import type { MCPTool, ToolContext } from '../ts/mcp-base';
import { MCPServer, errorResult, textResult } from '../ts/mcp-base';
import { PathSandbox } from '../ts/sandbox';

export async function createTempContext(): Promise<{ context: ToolContext; dir: string }> {
  const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'fs-sandbox-shared-')));
  const sandbox = await PathSandbox.create([dir]);
  return { context: { sandbox, logger: new Logger({ silent: true, exit: () => undefined }) }, dir };
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

const echoSchema = z.object({ message: z.string().describe('Text to echo') });

/** Echoes `message`; fails on demand for `fail`, throws for `throw`. */
export const echoTool: MCPTool<z.infer<typeof echoSchema>> = {
  name: 'echo',
  description: 'Echo a message back',
  paramsSchema: echoSchema,
  async execute(params) {
    if (params.message === 'fail') return errorResult('echo: asked to fail');
    if (params.message === 'throw') throw new Error('boom');
    return textResult(params.message);
  },
};

const delaySchema = z.object({ ms: z.number().int().nonnegative(), label: z.string() });

export const delayTool: MCPTool<z.infer<typeof delaySchema>> = {
  name: 'delay',
  description: 'Answer with a label after a pause',
  paramsSchema: delaySchema,
  async execute(params) {
    await new Promise((resolve) => setTimeout(resolve, params.ms));
    return textResult(params.label);
  },
};

export function createTestServer(context: ToolContext): MCPServer {
  return new MCPServer({ name: 'test-server', version: '0.0.1', tools: [echoTool, delayTool], context });
}

/** JSON-RPC request line */
export function frame(id: string | number | null, method: string, params?: unknown): string {
  return JSON.stringify({ jsonrpc: '2.0', id, method, params });
}
