/**
 * Transport Layer
 *
 * Byte-stream access to the admin console.
 */

export { SocketTransport } from './socket.js';
export type { Transport, TransportFactory } from './types.js';
