import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { PassThrough } from 'stream';
import type { MCPServer } from '../ts/mcp-base';
import { StdioTransport } from '../ts/transport';
import { createTempContext, createTestServer, frame, removeTempDir } from './helpers';

function collect(stream: PassThrough): () => string[] {
  let buffer = '';
  stream.setEncoding('utf-8');
  stream.on('data', (chunk: string) => {
    buffer += chunk;
  });
  return () => buffer.split('\n').filter((line) => line.length > 0);
}

describe('StdioTransport', () => {
  let dir: string;
  let server: MCPServer;

  beforeAll(async () => {
    const temp = await createTempContext();
    dir = temp.dir;
    server = createTestServer(temp.context);
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  it('should answer one line per request line until EOF', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const lines = collect(output);
    const transport = new StdioTransport(input, output);

    const done = server.serve(transport);
    input.write(`${frame(1, 'mcp.call_tool', { name: 'echo', arguments: { message: 'one' } })}\n`);
    input.write('\n');
    input.write(`${frame('two', 'mcp.call_tool', { name: 'echo', arguments: { message: 'two' } })}\r\n`);
    input.end('not json\n');
    await done;

    expect(lines()).toEqual([
      '{"jsonrpc":"2.0","id":1,"result":{"content":[{"type":"text","text":"one"}]}}',
      '{"jsonrpc":"2.0","id":"two","result":{"content":[{"type":"text","text":"two"}]}}',
      expect.stringMatching(/^\{"jsonrpc":"2\.0","id":null,"error":\{"code":-32700,"message":"Parse error: /),
    ]);
  });

  it('should stop reading when closed', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const lines = collect(output);
    const transport = new StdioTransport(input, output);

    const done = server.serve(transport);
    input.write(`${frame(1, 'mcp.list_tools')}\n`);
    await new Promise((resolve) => setTimeout(resolve, 20));
    transport.close();
    await done;

    expect(lines()).toHaveLength(1);
  });
});
