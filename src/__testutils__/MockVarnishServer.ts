/**
 * MockVarnishServer - In-process stand-in for a varnishd admin console
 *
 * Listens on an ephemeral loopback port, greets with 200 or a 107 challenge,
 * checks the auth response against its secret and answers the handful of
 * commands the client sends.
 */

import { createHash } from 'node:crypto';
import * as net from 'node:net';

export const MOCK_CHALLENGE = 'qwertyuiopasdfghjklzxcvbnmqwerty';
export const MOCK_GREETING = 'Varnish Cache CLI 1.0\nType \'help\' for command list.';

export interface MockVarnishServerOptions {
  /** Challenge clients with 107 and require this secret */
  secret?: string;
  /** Initial child state */
  running?: boolean;
  /** Accept connections but never send anything */
  silent?: boolean;
  /** Answer commands (not the banner or auth) after this many milliseconds */
  replyDelayMs?: number;
}

function frame(code: number, body: string): string {
  return `${code} ${String(Buffer.byteLength(body)).padEnd(8)}\n${body}\n`;
}

export class MockVarnishServer {
  /** Every command line received, in order, across connections */
  readonly received: string[] = [];
  running: boolean;
  port = 0;

  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();

  constructor(private readonly options: MockVarnishServerOptions = {}) {
    this.running = options.running ?? false;
  }

  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.accept(socket));
      this.server = server;
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        this.port = address !== null && typeof address === 'object' ? address.port : 0;
        resolve(this.port);
      });
    });
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => {
      // client went away; nothing to clean up beyond the close handler
    });
    if (this.options.silent) return;

    let authenticated = this.options.secret === undefined;
    socket.write(
      authenticated
        ? frame(200, MOCK_GREETING)
        : frame(107, `${MOCK_CHALLENGE}\n\nAuthentication required.\n`)
    );

    let buffer = '';
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf-8');
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        this.received.push(line);
        if (!authenticated) {
          authenticated = this.handleAuth(socket, line);
          continue;
        }
        const delay = this.options.replyDelayMs;
        if (delay === undefined) {
          this.handleCommand(socket, line);
        } else {
          setTimeout(() => {
            if (!socket.destroyed) this.handleCommand(socket, line);
          }, delay);
        }
      }
    });
  }

  private handleAuth(socket: net.Socket, line: string): boolean {
    const expected = createHash('sha256')
      .update(`${MOCK_CHALLENGE}\n${this.options.secret ?? ''}${MOCK_CHALLENGE}\n`)
      .digest('hex');
    if (line === `auth ${expected}`) {
      socket.write(frame(200, MOCK_GREETING));
      return true;
    }
    socket.write(frame(107, `${MOCK_CHALLENGE}\n\nAuthentication required.\n`));
    return false;
  }

  private handleCommand(socket: net.Socket, line: string): void {
    const [name] = line.split(' ');
    switch (name) {
      case 'status':
        socket.write(frame(200, `Child in state ${this.running ? 'running' : 'stopped'}`));
        return;
      case 'start':
        this.running = true;
        socket.write(frame(200, ''));
        return;
      case 'stop':
        this.running = false;
        socket.write(frame(200, ''));
        return;
      case 'ban':
      case 'ban.url':
        socket.write(frame(200, ''));
        return;
      case 'quit':
        socket.end(frame(500, 'Closing CLI connection'));
        return;
      default:
        socket.write(frame(101, "Unknown request.\nType 'help' for more info."));
    }
  }
}
