import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  AuthenticationError,
  ConfigurationError,
  ProtocolError,
  TransportError,
  TransportTimeoutError,
  VarnishAdminError,
} from '@/errors.js';
import { getErrorMessage, getExitCode } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('errors - getErrorMessage', () => {
  void it('returns the message of an Error', () => {
    assert.equal(getErrorMessage(new Error('refused')), 'refused');
  });

  void it('stringifies anything else', () => {
    assert.equal(getErrorMessage('plain'), 'plain');
    assert.equal(getErrorMessage(42), '42');
    assert.equal(getErrorMessage(null), 'null');
  });
});

void describe('errors - getExitCode', () => {
  void it('reads the exit code carried by client errors', () => {
    assert.equal(getExitCode(new ConfigurationError('bad'), 1), EXIT_CODES.INVALID_ARGUMENTS);
    assert.equal(getExitCode(new TransportError('refused'), 1), EXIT_CODES.CONNECTION_FAILURE);
    assert.equal(getExitCode(new TransportTimeoutError('connect', 1000), 1), EXIT_CODES.TIMEOUT);
    assert.equal(getExitCode(new AuthenticationError(), 1), EXIT_CODES.AUTHENTICATION_FAILED);
    assert.equal(
      getExitCode(new ProtocolError('ban x command responded 106', 'ban x', 106, ''), 1),
      EXIT_CODES.PROTOCOL_ERROR
    );
  });

  void it('falls back for errors without one', () => {
    assert.equal(getExitCode(new Error('boom'), 104), 104);
    assert.equal(getExitCode({ exitCode: 5 }, 104), 104);
    assert.equal(getExitCode('boom', 1), 1);
  });
});

void describe('errors - client error classes', () => {
  void it('name themselves after their class', () => {
    const error = new ConfigurationError('bad');

    assert.ok(error instanceof VarnishAdminError);
    assert.equal(error.name, 'ConfigurationError');
    assert.equal(error.code, 'CONFIGURATION_ERROR');
  });

  void it('treat a timeout as a transport error', () => {
    const error = new TransportTimeoutError('read', 2500);

    assert.ok(error instanceof TransportError);
    assert.equal(error.message, 'read timed out after 2.5s');
    assert.equal(error.operation, 'read');
    assert.equal(error.timeoutMs, 2500);
    assert.equal(error.code, 'TRANSPORT_TIMEOUT');
  });

  void it('keep the cause of an authentication failure', () => {
    const cause = new ProtocolError('auth responded 107', 'auth <redacted>', 107, '');
    const error = new AuthenticationError(cause);

    assert.equal(error.message, 'Authentication failed');
    assert.equal(error.cause, cause);
  });

  void it('carry command, status and body on protocol errors', () => {
    const error = new ProtocolError('start command responded 300', 'start', 300, 'busy');

    assert.equal(error.command, 'start');
    assert.equal(error.status, 300);
    assert.equal(error.body, 'busy');
  });
});
