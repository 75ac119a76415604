/**
 * SocketTransport Contract Tests
 *
 * Runs the transport against throwaway `net` servers on the loopback
 * interface: connect, exchange bytes, time out, end of stream, close.
 */

import assert from 'node:assert/strict';
import * as net from 'node:net';
import { afterEach, describe, it } from 'node:test';

import { assertRejectsWith } from '@/__testutils__/index.js';
import { TransportError, TransportTimeoutError } from '@/errors.js';
import { SocketTransport } from '@/transport/socket.js';

const HOST = '127.0.0.1';

/**
 * Start a server that hands each accepted socket to `onSocket`.
 */
async function listen(onSocket: (socket: net.Socket) => void): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer(onSocket);
  await new Promise<void>((resolve) => server.listen(0, HOST, () => resolve()));
  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');
  return { server, port: address.port };
}

void describe('SocketTransport', () => {
  const servers: net.Server[] = [];
  const sockets: net.Socket[] = [];
  const transports: SocketTransport[] = [];

  async function serve(onSocket: (socket: net.Socket) => void): Promise<number> {
    const { server, port } = await listen((socket) => {
      sockets.push(socket);
      socket.on('error', () => {
        // the client side is torn down by the tests
      });
      onSocket(socket);
    });
    servers.push(server);
    return port;
  }

  function transport(): SocketTransport {
    const t = new SocketTransport();
    transports.push(t);
    return t;
  }

  afterEach(async () => {
    transports.splice(0).forEach((t) => t.close());
    sockets.splice(0).forEach((s) => s.destroy());
    await Promise.all(
      servers.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve())))
    );
  });

  void it('reads what the server writes and writes what the server reads', async () => {
    const received: string[] = [];
    const port = await serve((socket) => {
      socket.write('200 5       \nhello\n');
      socket.on('data', (chunk: Buffer) => received.push(chunk.toString()));
    });
    const t = transport();

    await t.open({ host: HOST, port }, 1000);
    let text = '';
    while (text.length < 19) {
      const chunk = await t.read();
      assert.ok(chunk);
      text += chunk.toString();
    }
    await t.write('status\n');

    assert.equal(text, '200 5       \nhello\n');
    await new Promise((resolve) => setTimeout(resolve, 50));
    assert.equal(received.join(''), 'status\n');
  });

  void it('reports end of stream as null', async () => {
    const port = await serve((socket) => socket.end());
    const t = transport();

    await t.open({ host: HOST, port }, 1000);

    assert.equal(await t.read(), null);
  });

  void it('times out a read when the server stays silent', async () => {
    const port = await serve(() => {
      // accept and say nothing
    });
    const t = transport();
    await t.open({ host: HOST, port }, 100);

    const error = await assertRejectsWith(() => t.read(), TransportTimeoutError, /read timed out/);

    assert.equal(error.operation, 'read');
    assert.equal(error.timeoutMs, 100);
  });

  void it('fails to connect to a closed port', async () => {
    const { server, port } = await listen(() => undefined);
    await new Promise<void>((resolve) => server.close(() => resolve()));

    await assertRejectsWith(
      () => transport().open({ host: HOST, port }, 1000),
      TransportError,
      new RegExp(`Connection to ${HOST}:${port} failed`)
    );
  });

  void it('rejects a pending read when closed', async () => {
    const port = await serve(() => undefined);
    const t = transport();
    await t.open({ host: HOST, port }, 1000);

    const pending = t.read();
    t.close();

    await assertRejectsWith(() => pending, TransportError, /transport is closed/);
  });

  void it('refuses reads, writes and reconnects after close', async () => {
    const port = await serve(() => undefined);
    const t = transport();
    await t.open({ host: HOST, port }, 1000);

    t.close();
    t.close();

    await assertRejectsWith(() => t.read(), TransportError, /Cannot read: transport is closed/);
    await assertRejectsWith(() => t.write('status\n'), TransportError, /Cannot write/);
    await assertRejectsWith(() => t.open({ host: HOST, port }, 1000), TransportError);
  });

  void it('refuses reads before open', async () => {
    await assertRejectsWith(() => transport().read(), TransportError, /transport is not open/);
  });
});
