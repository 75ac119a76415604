/**
 * Admin console protocol: framing, authentication and command vocabulary.
 */

export { computeAuthResponse, extractChallenge } from './auth.js';
export { ProtocolClient, quoteResponseBody } from './client.js';
export type { HandshakeResult, ProtocolClientOptions } from './client.js';
export {
  DEFAULT_VERSION,
  SUPPORTED_VERSIONS,
  describeSupportedVersions,
  isSupportedVersion,
  parseProtocolVersion,
  resolveCommandSet,
} from './commands.js';
export type { CommandSet, ProtocolVersion } from './commands.js';
export { ResponseFramer } from './framer.js';
export { STATUS } from './status.js';
export type { StatusCode } from './status.js';
