import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as http from 'http';
import type { IncomingMessage } from 'http';
import { startSseServer, type SseServerHandle } from '../ts/sse-server';
import { createTempContext, createTestServer, frame, removeTempDir } from './helpers';

interface SseEvent {
  event: string;
  data: string;
}

/** Minimal event-stream reader over an HTTP response. */
class EventReader {
  private readonly chunks: AsyncIterator<unknown>;
  private buffer = '';

  constructor(response: IncomingMessage) {
    response.setEncoding('utf-8');
    this.chunks = response[Symbol.asyncIterator]();
  }

  async next(): Promise<SseEvent> {
    for (;;) {
      const end = this.buffer.indexOf('\n\n');
      if (end !== -1) {
        const block = this.buffer.slice(0, end);
        this.buffer = this.buffer.slice(end + 2);
        const event: SseEvent = { event: 'message', data: '' };
        for (const line of block.split('\n')) {
          if (line.startsWith('event: ')) event.event = line.slice('event: '.length);
          if (line.startsWith('data: ')) event.data = line.slice('data: '.length);
        }
        return event;
      }
      const { value, done } = await this.chunks.next();
      if (done) throw new Error('stream ended');
      this.buffer += String(value);
    }
  }
}

function openStream(url: string): Promise<IncomingMessage> {
  return new Promise((resolve, reject) => {
    http.get(url, resolve).on('error', reject);
  });
}

describe('startSseServer', () => {
  let dir: string;
  let handle: SseServerHandle;
  let baseUrl: string;

  beforeAll(async () => {
    const temp = await createTempContext();
    dir = temp.dir;
    handle = await startSseServer({
      server: createTestServer(temp.context),
      host: '127.0.0.1',
      port: 0,
      logger: temp.context.logger,
    });
    baseUrl = `http://127.0.0.1:${handle.port}`;
  });

  afterAll(async () => {
    await handle.close();
    await removeTempDir(dir);
  });

  async function openSession(): Promise<{ events: EventReader; endpoint: string }> {
    const response = await openStream(`${baseUrl}/sse`);
    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/event-stream');

    const events = new EventReader(response);
    const first = await events.next();
    expect(first.event).toBe('endpoint');
    expect(first.data).toMatch(/^\/message\?sessionId=[0-9a-f-]{36}$/);
    return { events, endpoint: first.data };
  }

  function post(endpoint: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${endpoint}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('should bind an ephemeral port', () => {
    expect(handle.port).toBeGreaterThan(0);
  });

  it('should answer POSTed requests on the event stream in order', async () => {
    const { events, endpoint } = await openSession();

    const slow = await post(endpoint, frame(1, 'mcp.call_tool', { name: 'delay', arguments: { ms: 30, label: 'slow' } }));
    const fast = await post(endpoint, frame(2, 'mcp.call_tool', { name: 'echo', arguments: { message: 'fast' } }));
    expect(slow.status).toBe(202);
    expect(fast.status).toBe(202);

    const firstReply = await events.next();
    const secondReply = await events.next();
    expect(firstReply).toEqual({
      event: 'message',
      data: '{"jsonrpc":"2.0","id":1,"result":{"content":[{"type":"text","text":"slow"}]}}',
    });
    expect(secondReply).toEqual({
      event: 'message',
      data: '{"jsonrpc":"2.0","id":2,"result":{"content":[{"type":"text","text":"fast"}]}}',
    });
  });

  it('should keep sessions apart', async () => {
    const one = await openSession();
    const two = await openSession();
    expect(one.endpoint).not.toBe(two.endpoint);

    await post(two.endpoint, frame('b', 'mcp.call_tool', { name: 'echo', arguments: { message: 'to two' } }));
    await post(one.endpoint, frame('a', 'mcp.call_tool', { name: 'echo', arguments: { message: 'to one' } }));

    expect(JSON.parse((await one.events.next()).data)).toMatchObject({ id: 'a' });
    expect(JSON.parse((await two.events.next()).data)).toMatchObject({ id: 'b' });
  });

  it('should report parse errors on the stream', async () => {
    const { events, endpoint } = await openSession();
    await post(endpoint, '{oops');

    const reply = JSON.parse((await events.next()).data);
    expect(reply).toMatchObject({ id: null, error: { code: -32700 } });
  });

  it('should reject a missing or unknown session', async () => {
    const missing = await post('/message', frame(1, 'mcp.list_tools'));
    const unknown = await post('/message?sessionId=00000000-0000-0000-0000-000000000000', frame(1, 'mcp.list_tools'));

    expect(missing.status).toBe(400);
    expect(unknown.status).toBe(404);
  });

  it('should reject an empty body and keep the session usable', async () => {
    const { events, endpoint } = await openSession();
    const empty = await post(endpoint, '  \n');

    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ error: 'empty request body' });

    await post(endpoint, frame(7, 'mcp.list_tools'));
    expect(JSON.parse((await events.next()).data)).toMatchObject({ id: 7 });
  });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ status: 'ok' });
  });
});
