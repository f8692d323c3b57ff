/**
 * RadioLink - one radio connection on one port.
 *
 * Wraps the driver's connection object so the rest of the bridge sees a
 * single handle per link whose failures are already classified. Handlers
 * registered here survive close/open cycles; the link re-attaches them to
 * each new connection.
 */

import {
  BridgeError,
  CommandError,
  ConnectionError,
  SendError,
  UnsupportedError,
  toErrorMessage,
} from './errors.js';
import type { LinkId, MeshMessage, NodeInfo, RadioConnection, RadioDriver, RadioPacket } from './types.js';
import { withTimeout } from '../utils/sleep.js';
import { createLogger, type Logger } from '../resiliency/logger.js';

export interface RadioLinkConfig {
  id: LinkId;
  port: string;
  /** Probe timeout in ms; a probe that never answers counts as a failure (default: 10s) */
  probeTimeoutMs?: number;
  /** Send timeout in ms; a send still pending after this fails with SendError (default: 10s) */
  sendTimeoutMs?: number;
}

type PacketHandler = (packet: RadioPacket) => void;
type DisconnectHandler = (reason: Error) => void;

const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const DEFAULT_SEND_TIMEOUT_MS = 10_000;

export class RadioLink {
  readonly id: LinkId;
  readonly port: string;
  private readonly driver: RadioDriver;
  private readonly probeTimeoutMs: number;
  private readonly sendTimeoutMs: number;
  private readonly logger: Logger;

  private connection?: RadioConnection;
  private detach: Array<() => void> = [];
  private packetHandlers = new Set<PacketHandler>();
  private disconnectHandlers = new Set<DisconnectHandler>();

  constructor(driver: RadioDriver, config: RadioLinkConfig) {
    this.driver = driver;
    this.id = config.id;
    this.port = config.port;
    this.probeTimeoutMs = config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.sendTimeoutMs = config.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.logger = createLogger('link');
  }

  get isOpen(): boolean {
    return this.connection !== undefined;
  }

  /**
   * Single open attempt. Retrying is the connection manager's job.
   */
  async open(): Promise<void> {
    if (this.connection) return;

    let connection: RadioConnection;
    try {
      connection = await this.driver.open(this.port);
    } catch (err) {
      throw new ConnectionError(`Failed to open ${this.port}: ${toErrorMessage(err)}`, {
        link: this.id,
        cause: err,
      });
    }

    this.connection = connection;
    this.detach.push(connection.onReceive((packet) => this.dispatchPacket(packet)));
    if (connection.onDisconnect) {
      this.detach.push(connection.onDisconnect((reason) => this.handleTransportLoss(connection, reason)));
    }
  }

  /**
   * Close the current connection. Idempotent; close failures are logged.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    this.connection = undefined;
    this.detachHandlers();

    try {
      await connection.close();
    } catch (err) {
      this.logger.warn('Error while closing radio', {
        link: this.id,
        port: this.port,
        error: toErrorMessage(err),
      });
    }
  }

  /**
   * @throws SendError when the link is closed, the driver rejects, or the
   * radio does not accept the message within the send timeout
   */
  async send(message: MeshMessage): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      throw new SendError(`Link ${this.id} is not connected`, { link: this.id });
    }

    try {
      await withTimeout(
        connection.send(message),
        this.sendTimeoutMs,
        `timed out after ${this.sendTimeoutMs}ms`
      );
    } catch (err) {
      throw new SendError(`Send on ${this.id} failed: ${toErrorMessage(err)}`, {
        link: this.id,
        cause: err,
      });
    }
  }

  /**
   * Liveness probe. Never throws: closed, rejected and timed-out probes are
   * all reported as unresponsive.
   */
  async isResponsive(): Promise<boolean> {
    const connection = this.connection;
    if (!connection) return false;

    try {
      return await withTimeout(
        connection.isResponsive(),
        this.probeTimeoutMs,
        `Probe timed out after ${this.probeTimeoutMs}ms`
      );
    } catch (err) {
      this.logger.debug('Health probe failed', { link: this.id, error: toErrorMessage(err) });
      return false;
    }
  }

  /**
   * @throws UnsupportedError when there is no connection or the radio cannot reboot
   * @throws CommandError when the reboot command failed
   */
  async requestReboot(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      throw new UnsupportedError(`Link ${this.id} is not connected`, { link: this.id });
    }

    try {
      await connection.requestReboot();
    } catch (err) {
      if (err instanceof UnsupportedError || err instanceof CommandError) throw err;
      if (err instanceof BridgeError) {
        throw new CommandError(err.message, { link: this.id, cause: err });
      }
      throw new CommandError(`Reboot of ${this.id} failed: ${toErrorMessage(err)}`, {
        link: this.id,
        cause: err,
      });
    }
  }

  /**
   * Identity of the attached radio. Undefined when the link is closed or the
   * driver cannot report it.
   */
  async getNodeInfo(): Promise<NodeInfo | undefined> {
    const connection = this.connection;
    if (!connection?.getNodeInfo) return undefined;
    return withTimeout(
      connection.getNodeInfo(),
      this.probeTimeoutMs,
      `Node info request timed out after ${this.probeTimeoutMs}ms`
    );
  }

  onMessage(handler: PacketHandler): () => void {
    this.packetHandlers.add(handler);
    return () => this.packetHandlers.delete(handler);
  }

  onDisconnect(handler: DisconnectHandler): () => void {
    this.disconnectHandlers.add(handler);
    return () => this.disconnectHandlers.delete(handler);
  }

  private dispatchPacket(packet: RadioPacket): void {
    for (const handler of this.packetHandlers) {
      try {
        handler(packet);
      } catch (err) {
        this.logger.error('Receive handler threw', { link: this.id, error: toErrorMessage(err) });
      }
    }
  }

  private handleTransportLoss(connection: RadioConnection, reason: Error): void {
    // Stale notification from a connection we already replaced
    if (this.connection !== connection) return;

    this.connection = undefined;
    this.detachHandlers();

    for (const handler of this.disconnectHandlers) {
      handler(reason);
    }
  }

  private detachHandlers(): void {
    for (const off of this.detach) off();
    this.detach = [];
  }
}
