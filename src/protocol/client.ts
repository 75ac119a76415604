/**
 * Protocol Client
 *
 * Handshake and command execution on top of the response framer.
 */

import { NEW_LINE } from '@/constants.js';
import { AuthenticationError, ConfigurationError, ProtocolError } from '@/errors.js';
import type { Transport } from '@/transport/index.js';
import type { ServerAddress } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';

import { computeAuthResponse, extractChallenge } from './auth.js';
import type { CommandSet } from './commands.js';
import { ResponseFramer } from './framer.js';
import { STATUS } from './status.js';

const log = createLogger('protocol');

/**
 * Outcome of the opening handshake.
 */
export interface HandshakeResult {
  /** Greeting text; after authentication this is the body of the auth reply */
  banner: string;
  /** Whether the server challenged and the challenge was answered */
  authenticated: boolean;
}

export interface ProtocolClientOptions {
  address: ServerAddress;
  commands: CommandSet;
  secret?: string | undefined;
}

/**
 * Prefix every line of a response body with "> " for error messages.
 *
 * @example
 * ```typescript
 * quoteResponseBody('Unknown request.\nType \'help\' for more info.\n');
 * // "> Unknown request.\n> Type 'help' for more info."
 * ```
 */
export function quoteResponseBody(body: string): string {
  return body
    .trim()
    .split(NEW_LINE)
    .map((line) => `> ${line}`)
    .join(NEW_LINE);
}

/**
 * Speaks the admin console protocol over an open transport.
 *
 * One command is in flight at a time: every call writes a request and waits
 * for its response before returning.
 */
export class ProtocolClient {
  private readonly framer: ResponseFramer;
  private readonly address: ServerAddress;
  private readonly commands: CommandSet;
  private readonly secret: string | undefined;

  constructor(
    private readonly transport: Transport,
    options: ProtocolClientOptions
  ) {
    this.framer = new ResponseFramer(transport);
    this.address = options.address;
    this.commands = options.commands;
    this.secret = options.secret;
  }

  /**
   * Read the banner and answer the authentication challenge if there is one.
   *
   * @throws ConfigurationError if the server challenges and no secret is set
   * @throws AuthenticationError if the challenge response is rejected or the
   * exchange fails for any other reason
   * @throws ProtocolError if the banner code is neither 107 nor 200
   */
  async handshake(): Promise<HandshakeResult> {
    const banner = await this.framer.readResponse();
    log.debug(`Banner ${banner.code} (${banner.body.length} bytes)`);

    if (banner.code === STATUS.AUTH) {
      if (!this.secret) {
        throw new ConfigurationError(
          'Authentication required; configure a secret (the contents of varnishd -S)'
        );
      }
      const digest = computeAuthResponse(extractChallenge(banner.body), this.secret);
      try {
        const greeting = await this.execute(`${this.commands.auth} ${digest}`, STATUS.OK);
        return { banner: greeting, authenticated: true };
      } catch (error) {
        throw new AuthenticationError(error);
      }
    }

    if (banner.code !== STATUS.OK) {
      throw new ProtocolError(
        `Bad response from varnishadm on ${this.address.host}:${this.address.port}`,
        '',
        banner.code,
        banner.body.toString('utf-8')
      );
    }

    return { banner: banner.body.toString('utf-8'), authenticated: false };
  }

  /**
   * Send one command and return the response body.
   *
   * With an empty host nothing is written and `''` is returned, so callers
   * can run against a client that was never meant to connect.
   *
   * @param command - Command text without the trailing newline; empty sends a bare newline
   * @param expectedCode - Status code that counts as success
   * @throws ProtocolError if the server answers with any other code
   */
  async execute(command: string, expectedCode: number = STATUS.OK): Promise<string> {
    if (!this.address.host) {
      log.debug(`No host configured, skipping "${this.describe(command)}"`);
      return '';
    }

    await this.transport.write(command + NEW_LINE);
    const response = await this.framer.readResponse();
    const body = response.body.toString('utf-8');
    log.debug(`"${this.describe(command)}" responded ${response.code}`);

    if (response.code !== expectedCode) {
      throw new ProtocolError(
        `${command} command responded ${response.code}:${NEW_LINE}${quoteResponseBody(body)}`,
        command,
        response.code,
        body
      );
    }
    return body;
  }

  /** Command text safe for logs: the auth digest is never printed. */
  private describe(command: string): string {
    return command.startsWith(`${this.commands.auth} `) ? `${this.commands.auth} <redacted>` : command;
  }
}
