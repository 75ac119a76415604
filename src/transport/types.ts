import type { ServerAddress } from '@/types.js';

/**
 * Byte stream to an admin console.
 *
 * One transport carries one connection. Reads and writes are issued one at a
 * time by the protocol client; nothing here is safe for concurrent callers.
 */
export interface Transport {
  /**
   * Connect to the console. The timeout bounds the connect and, separately,
   * every later `read()`.
   */
  open(address: ServerAddress, timeoutMs: number): Promise<void>;

  /** Resolves once every byte of `data` has been accepted by the socket. */
  write(data: string): Promise<void>;

  /** Next chunk of bytes, or `null` once the peer has ended the stream. */
  read(): Promise<Buffer | null>;

  /** Release the connection. Safe to call more than once. */
  close(): void;
}

/**
 * Creates the transport a client will own.
 */
export type TransportFactory = () => Transport;
