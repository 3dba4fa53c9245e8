/**
 * Frame transports.
 *
 * A transport yields inbound frames (one JSON-RPC envelope each) and writes
 * outbound frames. `MCPServer.serve()` consumes exactly one transport per
 * connection.
 */

import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';

import { AsyncQueue } from './async-queue';

export interface FrameTransport {
  frames(): AsyncIterable<string>;
  send(frame: string): Promise<void>;
}

/** A transport that can be shut down from outside its read loop. */
export interface ClosableTransport extends FrameTransport {
  close(): void;
}

// ─── Stdio ──────────────────────────────────────────────────────────────────

/** Line-delimited frames over a readable/writable pair (stdin/stdout by default). */
export class StdioTransport implements ClosableTransport {
  private readonly input: Readable;
  private readonly output: Writable;
  private lines: Interface | undefined;
  private closed = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async *frames(): AsyncGenerator<string> {
    if (this.closed) return;
    // Created here so no line is emitted before the iterator attaches.
    const lines = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
    this.lines = lines;
    for await (const line of lines) {
      yield line;
    }
  }

  send(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(`${frame}\n`, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    this.closed = true;
    this.lines?.close();
  }
}

// ─── In-Memory ──────────────────────────────────────────────────────────────

/**
 * Frames pushed by the owner, responses handed to a sink. Backs SSE sessions,
 * where frames arrive as separate HTTP requests.
 */
export class QueueTransport implements ClosableTransport {
  private readonly queue = new AsyncQueue<string>();
  private readonly sink: (frame: string) => Promise<void>;

  constructor(sink: (frame: string) => Promise<void>) {
    this.sink = sink;
  }

  /** Queue an inbound frame. Returns false once the transport is closed. */
  push(frame: string): boolean {
    if (this.queue.isClosed()) return false;
    this.queue.push(frame);
    return true;
  }

  frames(): AsyncIterable<string> {
    return this.queue.drain();
  }

  send(frame: string): Promise<void> {
    return this.sink(frame);
  }

  close(): void {
    this.queue.close();
  }

  isClosed(): boolean {
    return this.queue.isClosed();
  }
}
