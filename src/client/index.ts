/**
 * Public API of the varnish-admin library.
 */

export { VarnishAdmin, createVarnishAdmin } from './VarnishAdmin.js';
export { resolveConfig } from './options.js';
export type { VarnishAdminConfig, VarnishAdminOptions } from './options.js';

export {
  AuthenticationError,
  ConfigurationError,
  ProtocolError,
  TransportError,
  TransportTimeoutError,
  VarnishAdminError,
} from '@/errors.js';
export {
  STATUS,
  SUPPORTED_VERSIONS,
  computeAuthResponse,
  parseProtocolVersion,
  resolveCommandSet,
} from '@/protocol/index.js';
export type { CommandSet, ProtocolVersion } from '@/protocol/index.js';
export { SocketTransport } from '@/transport/index.js';
export type { Transport, TransportFactory } from '@/transport/index.js';
export type { ChildState, ConnectionState, ServerAddress, VarnishResponse } from '@/types.js';
