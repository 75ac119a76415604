/**
 * assertions - Custom assertion helpers for contract tests
 */

import assert from 'node:assert/strict';

/**
 * Assert that an async function rejects with an instance of `ErrorClass`
 * whose message matches `pattern`.
 *
 * @returns The rejection, for further assertions
 *
 * @example
 * const error = await assertRejectsWith(() => admin.connect(), ConfigurationError, /secret/);
 */
export async function assertRejectsWith<T extends Error>(
  fn: () => Promise<unknown>,
  ErrorClass: abstract new (...args: never[]) => T,
  pattern?: RegExp
): Promise<T> {
  let caught: unknown;
  try {
    await fn();
  } catch (error) {
    caught = error;
  }
  assert.ok(caught !== undefined, `Expected rejection with ${ErrorClass.name}`);
  assert.ok(
    caught instanceof ErrorClass,
    `Expected ${ErrorClass.name}, got ${caught instanceof Error ? caught.name : String(caught)}`
  );
  if (pattern) {
    assert.match(caught.message, pattern);
  }
  return caught;
}
