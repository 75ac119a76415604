import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { executeCommand } from '@/commands/shared/CommandRunner.js';
import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { AuthenticationError, TransportTimeoutError } from '@/errors.js';
import { VERSION } from '@/utils/version.js';

interface Count {
  n: number;
}

const succeed = (): Promise<CommandResult<Count>> =>
  Promise.resolve({ success: true, data: { n: 1 } });

const formatCount = (data: Count): string => `n=${data.n}`;

function parseStdout(stdout: string | undefined): unknown {
  assert.ok(stdout !== undefined);
  return JSON.parse(stdout);
}

void describe('CommandRunner - executeCommand', () => {
  void describe('successful handlers', () => {
    void it('formats data for humans', async () => {
      const outcome = await executeCommand<BaseCommandOptions, Count>(succeed, {}, formatCount);

      assert.deepEqual(outcome, { exitCode: 0, stdout: 'n=1' });
    });

    void it('wraps data in a success object with --json', async () => {
      const outcome = await executeCommand<BaseCommandOptions, Count>(
        succeed,
        { json: true },
        formatCount
      );

      assert.equal(outcome.exitCode, 0);
      assert.deepEqual(parseStdout(outcome.stdout), {
        version: VERSION,
        success: true,
        data: { n: 1 },
      });
    });

    void it('prints raw JSON when there is no formatter', async () => {
      const outcome = await executeCommand<BaseCommandOptions, Count>(succeed, {});

      assert.deepEqual(outcome, { exitCode: 0, stdout: '{\n  "n": 1\n}' });
    });
  });

  void describe('failed handlers', () => {
    void it('uses the exit code and message from the result', async () => {
      const outcome = await executeCommand(
        () =>
          Promise.resolve({ success: false, error: 'status command failed', exitCode: 101 }),
        {}
      );

      assert.deepEqual(outcome, { exitCode: 101, stderr: 'Error: status command failed' });
    });

    void it('defaults to exit code 1 and a generic message', async () => {
      const outcome = await executeCommand(() => Promise.resolve({ success: false }), {});

      assert.deepEqual(outcome, { exitCode: 1, stderr: 'Error: Unknown error' });
    });

    void it('reports failures as JSON with --json', async () => {
      const outcome = await executeCommand(
        () => Promise.resolve({ success: false, error: 'nope', exitCode: 101 }),
        { json: true }
      );

      assert.equal(outcome.exitCode, 101);
      assert.equal(outcome.stderr, undefined);
      assert.deepEqual(parseStdout(outcome.stdout), {
        version: VERSION,
        success: false,
        error: 'nope',
        exitCode: 101,
      });
    });
  });

  void describe('thrown errors', () => {
    void it('keeps the semantic exit code and appends a suggestion', async () => {
      const outcome = await executeCommand(
        () => Promise.reject(new AuthenticationError(new Error('bad digest'))),
        {}
      );

      assert.deepEqual(outcome, {
        exitCode: 82,
        stderr:
          'Error: Authentication failed\n' +
          'Check that --secret-file points at the file varnishd was started with (-S).',
      });
    });

    void it('treats foreign errors as unhandled', async () => {
      const outcome = await executeCommand(() => Promise.reject(new Error('boom')), {});

      assert.deepEqual(outcome, { exitCode: 104, stderr: 'Error: boom' });
    });

    void it('includes the error code and suggestion with --json', async () => {
      const outcome = await executeCommand(
        () => Promise.reject(new TransportTimeoutError('read', 5000)),
        { json: true }
      );

      assert.equal(outcome.exitCode, 102);
      assert.deepEqual(parseStdout(outcome.stdout), {
        version: VERSION,
        success: false,
        error: 'read timed out after 5s',
        exitCode: 102,
        code: 'TRANSPORT_TIMEOUT',
        suggestion: 'Increase --timeout or check that the admin port is reachable.',
      });
    });
  });
});
