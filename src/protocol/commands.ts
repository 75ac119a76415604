/**
 * Command vocabulary per protocol version.
 *
 * varnishd renamed its invalidation commands over time (purge → ban,
 * purge.url → ban.url → a req.url ban expression). The table is fixed per
 * major version and resolved once when a client is constructed.
 */

import { ConfigurationError } from '@/errors.js';

/**
 * Major versions of varnishd the client can talk to.
 */
export const SUPPORTED_VERSIONS = [3, 4, 5, 6] as const;

export type ProtocolVersion = (typeof SUPPORTED_VERSIONS)[number];

/**
 * Version used when none (or an unparsable one) is given.
 */
export const DEFAULT_VERSION: ProtocolVersion = 3;

/**
 * Command names for one protocol version.
 */
export interface CommandSet {
  readonly auth: string;
  readonly purge: string;
  readonly purgeUrl: string;
  readonly start: string;
  readonly stop: string;
  readonly status: string;
  readonly quit: string;
}

const COMMANDS_V3: CommandSet = Object.freeze({
  auth: 'auth',
  purge: 'ban',
  purgeUrl: 'ban.url',
  start: 'start',
  stop: 'stop',
  status: 'status',
  quit: 'quit',
});

const COMMANDS_V4: CommandSet = Object.freeze({
  ...COMMANDS_V3,
  purgeUrl: 'ban req.url ~',
});

// 5.x dropped nothing 4.x relied on; 6.x kept the 5.x commands as they were.
const COMMANDS_V5: CommandSet = Object.freeze({ ...COMMANDS_V4 });

/**
 * Resolve the command table for a version.
 *
 * @example
 * ```typescript
 * resolveCommandSet(3).purgeUrl; // 'ban.url'
 * resolveCommandSet(6).purgeUrl; // 'ban req.url ~'
 * ```
 */
export function resolveCommandSet(version: ProtocolVersion): CommandSet {
  switch (version) {
    case 3:
      return COMMANDS_V3;
    case 4:
      return COMMANDS_V4;
    case 5:
    case 6:
      return COMMANDS_V5;
    default: {
      const unreachable: never = version;
      throw new ConfigurationError(`Unhandled protocol version: ${String(unreachable)}`);
    }
  }
}

/**
 * Type guard for supported major versions.
 */
export function isSupportedVersion(value: number): value is ProtocolVersion {
  return SUPPORTED_VERSIONS.some((version) => version === value);
}

/**
 * Render the supported set for error messages: "3, 4, 5, and 6".
 */
export function describeSupportedVersions(): string {
  const sorted = [...SUPPORTED_VERSIONS].sort((a, b) => a - b).map(String);
  const last = sorted.length - 1;
  if (last > 0) {
    sorted[last] = `and ${sorted[last] ?? ''}`;
  }
  return sorted.join(', ');
}

/**
 * Parse a version string such as "4", "4.1.3" or 6 to its major version.
 *
 * Only the text before the first '.' counts. Missing or unparsable input
 * falls back to {@link DEFAULT_VERSION}.
 *
 * @throws ConfigurationError when the major version is not supported
 */
export function parseProtocolVersion(input?: string | number | null): ProtocolVersion {
  const text = input === undefined || input === null ? '' : String(input).trim();
  const major = text === '' ? Number.NaN : parseInt(text.split('.')[0] ?? '', 10);

  if (Number.isNaN(major)) {
    return DEFAULT_VERSION;
  }
  if (!isSupportedVersion(major)) {
    throw new ConfigurationError(
      `Only versions ${describeSupportedVersions()} of Varnish are supported`
    );
  }
  return major;
}
