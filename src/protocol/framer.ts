/**
 * Response Framer
 *
 * Turns the transport's byte stream into `{ code, body }` responses. A
 * response is a status line `<code> <length>` followed by exactly `length`
 * body bytes and a trailing newline.
 */

import { TransportError } from '@/errors.js';
import type { Transport } from '@/transport/index.js';
import type { VarnishResponse } from '@/types.js';

// varnishd pads the length field with trailing spaces; anything after the digits is ignored.
const STATUS_LINE = /^(\d{3}) (\d+)/;

const NEW_LINE_BYTE = 0x0a;

/**
 * Reads framed responses from a transport.
 *
 * Bytes read past the end of one response stay buffered for the next one.
 * Lines that do not look like a status line are skipped, which is also how
 * the newline after each body gets consumed.
 */
export class ResponseFramer {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly transport: Transport) {}

  /**
   * Read the next complete response.
   *
   * @throws TransportError if the stream ends before a status line or before
   * the declared number of body bytes arrived
   */
  async readResponse(): Promise<VarnishResponse> {
    const { code, length } = await this.readStatusLine();
    const body = await this.readBody(length);
    return { code, body };
  }

  private async readStatusLine(): Promise<{ code: number; length: number }> {
    for (;;) {
      const line = await this.readLine();
      if (line === null) {
        throw new TransportError('No status code found in response');
      }
      const match = STATUS_LINE.exec(line);
      if (match?.[1] && match[2]) {
        return { code: parseInt(match[1], 10), length: parseInt(match[2], 10) };
      }
    }
  }

  private async readLine(): Promise<string | null> {
    for (;;) {
      const index = this.buffer.indexOf(NEW_LINE_BYTE);
      if (index !== -1) {
        const line = this.buffer.subarray(0, index).toString('utf-8');
        this.buffer = this.buffer.subarray(index + 1);
        return line;
      }
      if (!(await this.fill())) {
        if (this.buffer.length === 0) {
          return null;
        }
        const rest = this.buffer.toString('utf-8');
        this.buffer = Buffer.alloc(0);
        return rest;
      }
    }
  }

  private async readBody(length: number): Promise<Buffer> {
    while (this.buffer.length < length) {
      if (!(await this.fill())) {
        throw new TransportError(
          `Response body truncated: expected ${length} bytes, received ${this.buffer.length}`
        );
      }
    }
    const body = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return body;
  }

  /**
   * Append the next transport chunk to the buffer.
   *
   * @returns false once the stream has ended
   */
  private async fill(): Promise<boolean> {
    const chunk = await this.transport.read();
    if (chunk === null) {
      return false;
    }
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    return true;
  }
}
