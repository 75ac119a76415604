/**
 * FakeTransport - Scripted in-memory transport for protocol tests
 *
 * Server output is either queued up front (`chunks`) or produced in reply to
 * each write (`respond`). Once the queue is empty, reads report end of stream.
 */

import type { Transport } from '@/transport/index.js';
import type { ServerAddress } from '@/types.js';

type Chunk = string | Buffer;

export interface FakeTransportOptions {
  /** Server output available before anything is written */
  chunks?: Chunk[];
  /** Server output produced in reply to a write */
  respond?: (data: string) => Chunk[];
  /** Make open() fail */
  openError?: Error;
  /** Make every read() fail once the queue is empty */
  readError?: Error;
}

/**
 * Build one response the way varnishd frames it: status line with the length
 * padded to eight columns, body, trailing newline.
 */
export function vcliResponse(code: number, body: string): string {
  return `${code} ${String(Buffer.byteLength(body)).padEnd(8)}\n${body}\n`;
}

export class FakeTransport implements Transport {
  /** Everything written, one entry per write() */
  readonly writes: string[] = [];
  /** Order of reads and writes, e.g. ['open', 'read', 'write:status\n'] */
  readonly events: string[] = [];
  opened: { address: ServerAddress; timeoutMs: number } | null = null;
  closeCount = 0;

  private readonly queue: Buffer[];
  private readonly options: FakeTransportOptions;

  constructor(options: FakeTransportOptions = {}) {
    this.options = options;
    this.queue = (options.chunks ?? []).map(toBuffer);
  }

  open(address: ServerAddress, timeoutMs: number): Promise<void> {
    this.events.push('open');
    if (this.options.openError) {
      return Promise.reject(this.options.openError);
    }
    this.opened = { address, timeoutMs };
    return Promise.resolve();
  }

  write(data: string): Promise<void> {
    this.events.push(`write:${data}`);
    this.writes.push(data);
    if (this.options.respond) {
      this.queue.push(...this.options.respond(data).map(toBuffer));
    }
    return Promise.resolve();
  }

  read(): Promise<Buffer | null> {
    this.events.push('read');
    const chunk = this.queue.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }
    if (this.options.readError) {
      return Promise.reject(this.options.readError);
    }
    return Promise.resolve(null);
  }

  close(): void {
    this.closeCount++;
  }
}

function toBuffer(chunk: Chunk): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
}
