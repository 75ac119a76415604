import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, before, describe, it } from 'node:test';

import {
  parsePort,
  parseTarget,
  readSecretFile,
  resolveConnectionOptions,
} from '@/commands/shared/connectionOptions.js';
import { ConfigurationError } from '@/errors.js';

const fakeReadSecret = (path: string): string => `secret from ${path}`;

void describe('connectionOptions - parsePort', () => {
  void it('accepts ports in range', () => {
    assert.equal(parsePort('1'), 1);
    assert.equal(parsePort('6082'), 6082);
    assert.equal(parsePort('65535'), 65535);
  });

  void it('rejects anything else', () => {
    for (const value of ['0', '65536', '-1', '12a', '', '60.5']) {
      assert.throws(() => parsePort(value), {
        name: 'ConfigurationError',
        message: `Invalid port: ${value}`,
      });
    }
  });
});

void describe('connectionOptions - parseTarget', () => {
  void it('splits host and port', () => {
    assert.deepEqual(parseTarget('cache1:6083'), { host: 'cache1', port: 6083 });
  });

  void it('keeps a bare host without a port', () => {
    assert.deepEqual(parseTarget('cache1'), { host: 'cache1', port: undefined });
  });

  void it('treats an unbracketed IPv6 address as a host', () => {
    assert.deepEqual(parseTarget('::1'), { host: '::1', port: undefined });
  });

  void it('reads bracketed IPv6 addresses', () => {
    assert.deepEqual(parseTarget('[::1]:6082'), { host: '::1', port: 6082 });
    assert.deepEqual(parseTarget('[::1]'), { host: '::1', port: undefined });
  });

  void it('rejects malformed targets', () => {
    assert.throws(() => parseTarget('[::1'), { message: 'Invalid target: [::1' });
    assert.throws(() => parseTarget('[::1]6082'), { message: 'Invalid target: [::1]6082' });
    assert.throws(() => parseTarget('cache1:abc'), { message: 'Invalid port: abc' });
  });
});

void describe('connectionOptions - resolveConnectionOptions', () => {
  void it('leaves everything unset without flags or environment', () => {
    assert.deepEqual(resolveConnectionOptions({}, {}, fakeReadSecret), {
      host: undefined,
      port: undefined,
      version: undefined,
      secret: undefined,
      timeout: undefined,
    });
  });

  void it('falls back to the environment', () => {
    const env = {
      VARNISH_ADMIN_HOST: 'env-host',
      VARNISH_ADMIN_PORT: '7000',
      VARNISH_ADMIN_PROTOCOL: '4.1',
      VARNISH_ADMIN_SECRET_FILE: '/etc/varnish/secret',
      VARNISH_ADMIN_TIMEOUT: '3',
    };

    assert.deepEqual(resolveConnectionOptions({}, env, fakeReadSecret), {
      host: 'env-host',
      port: 7000,
      version: '4.1',
      secret: 'secret from /etc/varnish/secret',
      timeout: 3,
    });
  });

  void it('prefers -T over the environment', () => {
    const env = { VARNISH_ADMIN_HOST: 'env-host', VARNISH_ADMIN_PORT: '7000' };

    const options = resolveConnectionOptions({ target: 'cache1:6083' }, env, fakeReadSecret);

    assert.equal(options.host, 'cache1');
    assert.equal(options.port, 6083);
  });

  void it('takes the port from the environment when -T has none', () => {
    const env = { VARNISH_ADMIN_PORT: '7000' };

    const options = resolveConnectionOptions({ target: 'cache1' }, env, fakeReadSecret);

    assert.equal(options.host, 'cache1');
    assert.equal(options.port, 7000);
  });

  void it('prefers --host and --port over -T', () => {
    const options = resolveConnectionOptions(
      { target: 'cache1:6083', host: 'cache2', port: '6084' },
      {},
      fakeReadSecret
    );

    assert.equal(options.host, 'cache2');
    assert.equal(options.port, 6084);
  });

  void it('prefers flags over the environment for protocol, secret and timeout', () => {
    const env = {
      VARNISH_ADMIN_PROTOCOL: '4',
      VARNISH_ADMIN_SECRET_FILE: '/env/secret',
      VARNISH_ADMIN_TIMEOUT: '3',
    };

    const options = resolveConnectionOptions(
      { protocol: '6', secretFile: '/flag/secret', timeout: '2.5' },
      env,
      fakeReadSecret
    );

    assert.equal(options.version, '6');
    assert.equal(options.secret, 'secret from /flag/secret');
    assert.equal(options.timeout, 2.5);
  });

  void it('rejects a timeout that is not a number', () => {
    assert.throws(() => resolveConnectionOptions({ timeout: 'soon' }, {}, fakeReadSecret), {
      name: 'ConfigurationError',
      message: 'Invalid timeout: soon',
    });
  });

  void it('rejects an invalid port from the environment', () => {
    assert.throws(
      () => resolveConnectionOptions({}, { VARNISH_ADMIN_PORT: 'http' }, fakeReadSecret),
      ConfigurationError
    );
  });
});

void describe('connectionOptions - readSecretFile', () => {
  let dir = '';

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'varnish-admin-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  void it('returns the file contents verbatim, trailing newline included', () => {
    const path = join(dir, 'secret');
    writeFileSync(path, 'test-secret\n');

    assert.equal(readSecretFile(path), 'test-secret\n');
  });

  void it('reports a missing file as a configuration error', () => {
    const path = join(dir, 'missing');

    assert.throws(() => readSecretFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.startsWith(`Cannot read secret file ${path}: `));
      return true;
    });
  });
});
