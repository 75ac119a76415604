/**
 * Connection flags shared by every command, and their resolution into
 * client options (flags first, then environment, then library defaults).
 */

import { readFileSync } from 'fs';

import { Option } from 'commander';
import type { Command } from 'commander';

import type { VarnishAdminOptions } from '@/client/index.js';
import { ENV_VARS } from '@/constants.js';
import { ConfigurationError } from '@/errors.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Global flags as commander parses them (all strings).
 */
export interface ConnectionFlags {
  target?: string;
  host?: string;
  port?: string;
  protocol?: string;
  secretFile?: string;
  timeout?: string;
}

/**
 * Register the connection flags on the root program.
 */
export function addConnectionOptions(program: Command): void {
  program
    .addOption(new Option('-T, --target <host:port>', 'Admin console address'))
    .addOption(new Option('--host <host>', 'Admin console host (overrides -T)'))
    .addOption(new Option('--port <port>', 'Admin console port (overrides -T)'))
    .addOption(new Option('--protocol <version>', 'Varnish version, e.g. 4 or 6.0 (default 3)'))
    .addOption(new Option('-S, --secret-file <path>', 'File holding the shared secret'))
    .addOption(new Option('-t, --timeout <seconds>', 'Connect and read timeout (default 5)'));
}

/**
 * Parse a port number.
 *
 * @throws ConfigurationError if the value is not an integer in 1..65535
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Split a -T address into host and port.
 *
 * @example
 * ```typescript
 * parseTarget('cache1:6082');   // { host: 'cache1', port: 6082 }
 * parseTarget('[::1]:6082');    // { host: '::1', port: 6082 }
 * parseTarget('cache1');        // { host: 'cache1', port: undefined }
 * ```
 */
export function parseTarget(target: string): { host: string; port: number | undefined } {
  if (target.startsWith('[')) {
    const end = target.indexOf(']');
    if (end === -1) {
      throw new ConfigurationError(`Invalid target: ${target}`);
    }
    const rest = target.slice(end + 1);
    if (rest !== '' && !rest.startsWith(':')) {
      throw new ConfigurationError(`Invalid target: ${target}`);
    }
    return { host: target.slice(1, end), port: rest ? parsePort(rest.slice(1)) : undefined };
  }

  const colon = target.indexOf(':');
  if (colon === -1 || colon !== target.lastIndexOf(':')) {
    return { host: target, port: undefined };
  }
  return { host: target.slice(0, colon), port: parsePort(target.slice(colon + 1)) };
}

/**
 * Read the shared secret verbatim, trailing newline included, the way
 * varnishd hashes it.
 *
 * @throws ConfigurationError if the file cannot be read
 */
export function readSecretFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read secret file ${path}: ${getErrorMessage(error)}`, error);
  }
}

/**
 * Resolve flags and environment into client options.
 *
 * @param flags - Parsed global flags
 * @param env - Environment to fall back to
 * @param readSecret - Reads the secret file
 */
export function resolveConnectionOptions(
  flags: ConnectionFlags,
  env: NodeJS.ProcessEnv = process.env,
  readSecret: (path: string) => string = readSecretFile
): VarnishAdminOptions {
  const target = flags.target ? parseTarget(flags.target) : undefined;
  const envPort = env[ENV_VARS.PORT];

  const host = flags.host ?? target?.host ?? env[ENV_VARS.HOST];
  const port =
    flags.port !== undefined
      ? parsePort(flags.port)
      : (target?.port ?? (envPort ? parsePort(envPort) : undefined));

  const timeoutText = flags.timeout ?? env[ENV_VARS.TIMEOUT];
  const timeout = timeoutText !== undefined ? Number(timeoutText) : undefined;
  if (timeout !== undefined && Number.isNaN(timeout)) {
    throw new ConfigurationError(`Invalid timeout: ${timeoutText}`);
  }

  const secretFile = flags.secretFile ?? env[ENV_VARS.SECRET_FILE];

  return {
    host,
    port,
    version: flags.protocol ?? env[ENV_VARS.PROTOCOL],
    secret: secretFile ? readSecret(secretFile) : undefined,
    timeout,
  };
}
