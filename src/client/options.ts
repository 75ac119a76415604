/**
 * Client options and their resolution into an immutable configuration.
 */

import {
  DEFAULT_ADMIN_PORT,
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
} from '@/constants.js';
import { ConfigurationError } from '@/errors.js';
import { parseProtocolVersion } from '@/protocol/index.js';
import type { ProtocolVersion } from '@/protocol/index.js';
import type { TransportFactory } from '@/transport/index.js';
import type { ServerAddress } from '@/types.js';

/**
 * Options accepted by {@link createVarnishAdmin}.
 */
export interface VarnishAdminOptions {
  /** Admin console host (default 127.0.0.1). An empty string disables all I/O. */
  host?: string | undefined;
  /** Admin console port (default 6082) */
  port?: number | undefined;
  /** Varnish version, e.g. "4" or "6.0.2"; only the major counts (default 3) */
  version?: string | number | undefined;
  /** Shared secret (contents of the varnishd -S file), needed only if the server challenges */
  secret?: string | undefined;
  /** Connect/read timeout in seconds used when connect() gets none (default 5) */
  timeout?: number | undefined;
  /** Receives "already started/stopped" notices; defaults to the client logger */
  onNotice?: ((message: string) => void) | undefined;
  /** Supplies the transport; defaults to a TCP socket */
  transport?: TransportFactory | undefined;
}

/**
 * Validated configuration a client is built from. Frozen once resolved.
 */
export interface VarnishAdminConfig {
  readonly address: ServerAddress;
  readonly version: ProtocolVersion;
  readonly secret: string | undefined;
  readonly timeoutSeconds: number;
}

/**
 * Validate a timeout in seconds. Missing or zero selects the default.
 *
 * @throws ConfigurationError for negative, non-finite or too large values
 */
export function resolveTimeout(seconds: number | undefined): number {
  if (seconds === undefined || seconds === 0) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(`Invalid timeout: ${seconds}`);
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new ConfigurationError(
      `Invalid timeout: ${seconds} (at most ${MAX_TIMEOUT_SECONDS} seconds)`
    );
  }
  return seconds;
}

/**
 * Apply defaults and validate options.
 *
 * @throws ConfigurationError for an unsupported version, port or timeout
 */
export function resolveConfig(options: VarnishAdminOptions = {}): VarnishAdminConfig {
  const port = options.port ?? DEFAULT_ADMIN_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${port}`);
  }

  const address: ServerAddress = Object.freeze({ host: options.host ?? DEFAULT_HOST, port });

  return Object.freeze({
    address,
    version: parseProtocolVersion(options.version),
    secret: options.secret,
    timeoutSeconds: resolveTimeout(options.timeout),
  });
}
