/**
 * Socket Transport
 *
 * TCP transport for the admin console built on `net`. Incoming data is
 * queued as raw Buffers so the framer can count body bytes exactly.
 */

import { connect } from 'net';

import type { Socket } from 'net';

import { TransportError } from '@/errors.js';
import type { ServerAddress } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';

import {
  formatConnectionError,
  formatTimeoutError,
  formatUnavailableError,
  formatWriteError,
} from './errors.js';
import type { Transport } from './types.js';

const log = createLogger('transport');

interface PendingRead {
  resolve: (chunk: Buffer | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Transport over a `net.Socket`.
 *
 * @example
 * ```typescript
 * const transport = new SocketTransport();
 * await transport.open({ host: '127.0.0.1', port: 6082 }, 5000);
 * await transport.write('status\n');
 * const chunk = await transport.read();
 * transport.close();
 * ```
 */
export class SocketTransport implements Transport {
  private socket: Socket | null = null;
  private chunks: Buffer[] = [];
  private ended = false;
  private closed = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;
  private readTimeoutMs = 0;

  open(address: ServerAddress, timeoutMs: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(formatUnavailableError('connect', 'closed'));
    }
    if (this.socket) {
      return Promise.reject(
        new TransportError(`Transport already connected to ${address.host}:${address.port}`)
      );
    }

    this.chunks = [];
    this.ended = false;
    this.failure = null;
    this.readTimeoutMs = timeoutMs;

    return new Promise((resolve, reject) => {
      const socket = connect({ host: address.host, port: address.port });
      let settled = false;
      this.socket = socket;
      socket.setNoDelay(true);

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.socket = null;
        socket.destroy();
        reject(formatTimeoutError('connect', timeoutMs));
      }, timeoutMs);

      socket.once('connect', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.debug(`Connected to ${address.host}:${address.port}`);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        if (this.socket === socket) this.push(chunk);
      });

      socket.once('end', () => {
        if (this.socket === socket) this.finish(null);
      });

      socket.once('close', () => {
        if (this.socket === socket) this.finish(null);
      });

      socket.on('error', (error: Error) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          this.socket = null;
          socket.destroy();
          reject(formatConnectionError(address, error));
          return;
        }
        if (this.socket === socket) {
          log.debug(`Socket error: ${error.message}`);
          this.finish(formatConnectionError(address, error));
        }
      });
    });
  }

  write(data: string): Promise<void> {
    const socket = this.socket;
    if (this.closed) {
      return Promise.reject(formatUnavailableError('write', 'closed'));
    }
    if (!socket) {
      return Promise.reject(formatUnavailableError('write', 'not open'));
    }
    if (this.ended) {
      return Promise.reject(this.failure ?? formatUnavailableError('write', 'closed'));
    }

    return new Promise((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(formatWriteError(error));
        } else {
          resolve();
        }
      });
    });
  }

  read(): Promise<Buffer | null> {
    if (this.closed) {
      return Promise.reject(formatUnavailableError('read', 'closed'));
    }
    const chunk = this.chunks.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (!this.socket) {
      return Promise.reject(formatUnavailableError('read', 'not open'));
    }
    if (this.pending) {
      return Promise.reject(new TransportError('A read is already in progress'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(formatTimeoutError('read', this.readTimeoutMs));
      }, this.readTimeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const pending = this.pending;
    this.pending = null;
    if (pending) {
      clearTimeout(pending.timer);
      pending.reject(formatUnavailableError('read', 'closed'));
    }

    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
      log.debug('Connection closed');
    }
    this.chunks = [];
  }

  private push(chunk: Buffer): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.resolve(chunk);
      return;
    }
    this.chunks.push(chunk);
  }

  private finish(error: Error | null): void {
    if (error && !this.failure && !this.ended) {
      this.failure = error;
    }
    this.ended = true;

    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    if (this.failure) {
      pending.reject(this.failure);
    } else {
      pending.resolve(null);
    }
  }
}
