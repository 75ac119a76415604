import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { describe, it } from 'node:test';

import { computeAuthResponse, extractChallenge } from '@/protocol/auth.js';

const CHALLENGE = 'abcdefghijklmnopqrstuvwxyz012345';

void describe('extractChallenge', () => {
  void it('takes the first 32 bytes of the banner', () => {
    const banner = Buffer.from(`${CHALLENGE}\n\nAuthentication required.\n`);
    assert.equal(extractChallenge(banner).toString(), CHALLENGE);
  });

  void it('returns the whole banner when it is shorter than 32 bytes', () => {
    assert.equal(extractChallenge(Buffer.from('short')).toString(), 'short');
  });
});

void describe('computeAuthResponse', () => {
  void it('hashes challenge, newline, secret, challenge, newline', () => {
    const expected = createHash('sha256')
      .update(`${CHALLENGE}\ns3cr3t${CHALLENGE}\n`)
      .digest('hex');

    assert.equal(computeAuthResponse(Buffer.from(CHALLENGE), 's3cr3t'), expected);
  });

  void it('renders lowercase hex', () => {
    assert.match(computeAuthResponse(Buffer.from(CHALLENGE), 's3cr3t'), /^[0-9a-f]{64}$/);
  });

  void it('includes a trailing newline of the secret in the digest', () => {
    assert.notEqual(
      computeAuthResponse(Buffer.from(CHALLENGE), 'test-secret'),
      computeAuthResponse(Buffer.from(CHALLENGE), 'test-secret\n')
    );
  });
});
