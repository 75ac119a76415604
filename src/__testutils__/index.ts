/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { FakeTransport, MockVarnishServer, vcliResponse } from '@/__testutils__/index.js';
 * ```
 */

export { FakeTransport, vcliResponse, type FakeTransportOptions } from './FakeTransport.js';
export {
  MockVarnishServer,
  MOCK_CHALLENGE,
  MOCK_GREETING,
  type MockVarnishServerOptions,
} from './MockVarnishServer.js';
export { assertRejectsWith } from './assertions.js';
