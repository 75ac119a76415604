/**
 * Challenge/response authentication.
 *
 * When varnishd runs with -S it opens every connection with a 107 banner whose
 * first 32 bytes are a random challenge. The client proves knowledge of the
 * shared secret by answering `auth <sha256 hex>`.
 */

import { createHash } from 'crypto';

import { AUTH_CHALLENGE_LENGTH, NEW_LINE } from '@/constants.js';

/**
 * Take the challenge from a 107 banner body.
 */
export function extractChallenge(banner: Buffer): Buffer {
  return banner.subarray(0, AUTH_CHALLENGE_LENGTH);
}

/**
 * Compute the response digest: sha256(challenge + "\n" + secret + challenge + "\n").
 *
 * @returns Lowercase hex digest
 */
export function computeAuthResponse(challenge: Buffer, secret: string): string {
  return createHash('sha256')
    .update(challenge)
    .update(NEW_LINE)
    .update(secret)
    .update(challenge)
    .update(NEW_LINE)
    .digest('hex');
}
