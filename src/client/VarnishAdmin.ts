/**
 * VarnishAdmin
 *
 * High-level client for one admin console connection.
 */

import { ConfigurationError, TransportError } from '@/errors.js';
import { ProtocolClient, STATUS, resolveCommandSet } from '@/protocol/index.js';
import type { CommandSet, ProtocolVersion } from '@/protocol/index.js';
import { SocketTransport } from '@/transport/index.js';
import type { Transport } from '@/transport/index.js';
import type { ChildState, ConnectionState, ServerAddress } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import { resolveConfig, resolveTimeout } from './options.js';
import type { VarnishAdminConfig, VarnishAdminOptions } from './options.js';

const log = createLogger('client');

const CHILD_STATE = /Child in state (\w+)/;

/**
 * Client for the Varnish admin console.
 *
 * @example
 * ```typescript
 * const admin = createVarnishAdmin({ host: '127.0.0.1', port: 6082, version: '6', secret });
 * await admin.connect();
 * await admin.purgeUrl('/assets/app.css');
 * await admin.quit();
 * ```
 */
export class VarnishAdmin {
  readonly address: ServerAddress;
  readonly version: ProtocolVersion;
  readonly commands: CommandSet;

  private readonly config: VarnishAdminConfig;
  private readonly transport: Transport;
  private readonly protocol: ProtocolClient;
  private readonly notify: (message: string) => void;
  private currentState: ConnectionState = 'unconnected';

  constructor(options: VarnishAdminOptions = {}) {
    this.config = resolveConfig(options);
    this.address = this.config.address;
    this.version = this.config.version;
    this.commands = resolveCommandSet(this.version);
    this.transport = options.transport ? options.transport() : new SocketTransport();
    this.protocol = new ProtocolClient(this.transport, {
      address: this.address,
      commands: this.commands,
      secret: this.config.secret,
    });
    this.notify = options.onNotice ?? ((message) => log.info(message));
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * Open the connection and complete the handshake.
   *
   * @param timeoutSeconds - Bounds the connect and every later read (default from options)
   * @returns The banner
   */
  async connect(timeoutSeconds?: number): Promise<string> {
    if (this.currentState !== 'unconnected') {
      throw new TransportError(`Cannot connect: client is ${this.currentState}`);
    }
    if (!this.address.host) {
      throw new ConfigurationError('Cannot connect: no host configured');
    }
    const timeout =
      timeoutSeconds === undefined ? this.config.timeoutSeconds : resolveTimeout(timeoutSeconds);

    try {
      await this.transport.open(this.address, timeout * 1000);
      const { banner, authenticated } = await this.protocol.handshake();
      this.currentState = authenticated ? 'authenticated' : 'connected';
      return banner;
    } catch (error) {
      this.close();
      throw error;
    }
  }

  /**
   * Ban objects matching an expression, e.g. `req.http.host == example.com`.
   *
   * @returns Response body
   */
  purge(expression: string): Promise<string> {
    return this.commandWithArgument(this.commands.purge, expression);
  }

  /**
   * Ban objects whose URL matches.
   *
   * @returns Response body
   */
  purgeUrl(url: string): Promise<string> {
    return this.commandWithArgument(this.commands.purgeUrl, url);
  }

  /**
   * Start the cache child. Already running is a notice, not an error.
   */
  async start(): Promise<boolean> {
    if (await this.status()) {
      this.notify(`varnish host already started on ${this.describeAddress()}`);
      return true;
    }
    await this.command(this.commands.start);
    return true;
  }

  /**
   * Stop the cache child. Already stopped is a notice, not an error.
   */
  async stop(): Promise<boolean> {
    if (!(await this.status())) {
      this.notify(`varnish host already stopped on ${this.describeAddress()}`);
      return true;
    }
    await this.command(this.commands.stop);
    return true;
  }

  /**
   * Whether the cache child is running. Never rejects: any failure reads as false.
   */
  async status(): Promise<boolean> {
    return (await this.childState()) === 'running';
  }

  /**
   * State of the cache child, telling a stopped child apart from a failed query.
   */
  async childState(): Promise<ChildState> {
    let body: string;
    try {
      body = await this.command(this.commands.status);
    } catch (error) {
      log.debug(`status failed: ${getErrorMessage(error)}`);
      return 'unreachable';
    }
    return CHILD_STATE.exec(body)?.[1] === 'running' ? 'running' : 'stopped';
  }

  /**
   * Send `quit` and close the connection whatever the answer.
   */
  async quit(): Promise<void> {
    try {
      await this.command(this.commands.quit, STATUS.CLOSE);
    } catch (error) {
      log.debug(`quit failed: ${getErrorMessage(error)}`);
    }
    this.close();
  }

  /**
   * Close the connection without sending `quit`. Later calls do nothing.
   */
  close(): void {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';
    this.transport.close();
  }

  /**
   * Run one command. A transport failure leaves the stream out of step with
   * the commands sent, so it closes the client.
   */
  private async command(command: string, expectedCode: number = STATUS.OK): Promise<string> {
    if (this.currentState === 'closed') {
      throw new TransportError(`Cannot send "${command}": client is closed`);
    }
    try {
      return await this.protocol.execute(command, expectedCode);
    } catch (error) {
      if (error instanceof TransportError) {
        log.debug(`Closing after transport failure: ${error.message}`);
        this.close();
      }
      throw error;
    }
  }

  /** One command line per request: an argument may not carry a line break. */
  private commandWithArgument(command: string, argument: string): Promise<string> {
    if (/[\r\n]/.test(argument)) {
      return Promise.reject(
        new ConfigurationError(`Argument to "${command}" must not contain a line break`)
      );
    }
    return this.command(`${command} ${argument}`);
  }

  private describeAddress(): string {
    return `${this.address.host}:${this.address.port}`;
  }
}

/**
 * Build a client from options.
 *
 * @throws ConfigurationError for an unsupported version, port or timeout
 */
export function createVarnishAdmin(options: VarnishAdminOptions = {}): VarnishAdmin {
  return new VarnishAdmin(options);
}
