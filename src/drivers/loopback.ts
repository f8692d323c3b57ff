/**
 * Loopback radio driver.
 *
 * An in-memory RadioDriver with scriptable faults. The test suite uses it
 * as the radio stand-in, and `--driver loopback` runs the bridge without
 * hardware (messages go nowhere unless injected).
 */

import { CommandError, UnsupportedError } from '../bridge/errors.js';
import type { MeshMessage, NodeInfo, RadioConnection, RadioDriver, RadioPacket } from '../bridge/types.js';

export type RebootBehavior = 'accept' | 'unsupported' | 'fail';

/**
 * Scriptable state of one simulated radio. Survives reconnects, the way a
 * physical device survives its serial port being reopened.
 */
export class LoopbackRadio {
  readonly port: string;
  /** Messages successfully sent through this radio */
  readonly sent: MeshMessage[] = [];
  responsive = true;
  rebootBehavior: RebootBehavior = 'accept';
  rebootRequests = 0;
  openAttempts = 0;
  closeCount = 0;
  /** Next N open() calls reject */
  failNextOpens = 0;
  /** Every send rejects while set */
  sendFailure?: string;
  /** Probe never settles while set, like a hung device */
  hangProbe = false;
  /** Next N send() calls never settle */
  hangNextSends = 0;
  /** Reported by getNodeInfo(); unset means the radio cannot report its identity */
  nodeInfo?: NodeInfo;

  private connection?: LoopbackConnection;

  constructor(port: string) {
    this.port = port;
  }

  get isOpen(): boolean {
    return this.connection !== undefined;
  }

  /** Deliver a packet as if it had been heard on the mesh. */
  receive(packet: RadioPacket): void {
    this.connection?.emitPacket(packet);
  }

  /** Simulate the transport vanishing (cable pulled, device reset). */
  drop(reason = 'Device disconnected'): void {
    const connection = this.connection;
    this.connection = undefined;
    connection?.emitDisconnect(new Error(reason));
  }

  attach(connection: LoopbackConnection): void {
    this.connection = connection;
  }

  detach(connection: LoopbackConnection): void {
    if (this.connection === connection) {
      this.connection = undefined;
    }
  }
}

class LoopbackConnection implements RadioConnection {
  private readonly radio: LoopbackRadio;
  private packetHandlers = new Set<(packet: RadioPacket) => void>();
  private disconnectHandlers = new Set<(reason: Error) => void>();
  private closed = false;

  constructor(radio: LoopbackRadio) {
    this.radio = radio;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.radio.closeCount++;
    this.radio.detach(this);
  }

  async send(message: MeshMessage): Promise<void> {
    if (this.closed) throw new Error('Port closed');
    if (this.radio.sendFailure) throw new Error(this.radio.sendFailure);
    if (this.radio.hangNextSends > 0) {
      this.radio.hangNextSends--;
      return new Promise<void>(() => undefined);
    }
    this.radio.sent.push({ ...message });
  }

  async getNodeInfo(): Promise<NodeInfo> {
    if (this.closed) throw new Error('Port closed');
    const info = this.radio.nodeInfo;
    if (!info) {
      throw new UnsupportedError(`Radio on ${this.radio.port} does not report node info`);
    }
    return { ...info, channels: info.channels?.map((channel) => ({ ...channel })) };
  }

  onReceive(handler: (packet: RadioPacket) => void): () => void {
    this.packetHandlers.add(handler);
    return () => this.packetHandlers.delete(handler);
  }

  onDisconnect(handler: (reason: Error) => void): () => void {
    this.disconnectHandlers.add(handler);
    return () => this.disconnectHandlers.delete(handler);
  }

  isResponsive(): Promise<boolean> {
    if (this.radio.hangProbe) {
      return new Promise<boolean>(() => undefined);
    }
    return Promise.resolve(!this.closed && this.radio.responsive);
  }

  async requestReboot(): Promise<void> {
    this.radio.rebootRequests++;
    switch (this.radio.rebootBehavior) {
      case 'unsupported':
        throw new UnsupportedError(`Radio on ${this.radio.port} cannot reboot`);
      case 'fail':
        throw new CommandError(`Reboot command to ${this.radio.port} was not acknowledged`);
      case 'accept':
        return;
    }
  }

  emitPacket(packet: RadioPacket): void {
    for (const handler of this.packetHandlers) handler(packet);
  }

  emitDisconnect(reason: Error): void {
    this.closed = true;
    for (const handler of this.disconnectHandlers) handler(reason);
  }
}

export class LoopbackRadioDriver implements RadioDriver {
  readonly name = 'loopback';
  private radios = new Map<string, LoopbackRadio>();

  constructor(ports: string[] = []) {
    for (const port of ports) this.radio(port);
  }

  /** The simulated radio behind `port`, created on first use. */
  radio(port: string): LoopbackRadio {
    let radio = this.radios.get(port);
    if (!radio) {
      radio = new LoopbackRadio(port);
      this.radios.set(port, radio);
    }
    return radio;
  }

  async open(port: string): Promise<RadioConnection> {
    const radio = this.radio(port);
    radio.openAttempts++;
    if (radio.failNextOpens > 0) {
      radio.failNextOpens--;
      throw new Error(`Could not open ${port}`);
    }
    if (radio.isOpen) {
      throw new Error(`${port} is busy`);
    }

    const connection = new LoopbackConnection(radio);
    radio.attach(connection);
    return connection;
  }

  async listPorts(): Promise<string[]> {
    return Array.from(this.radios.keys());
  }
}

export function createRadioDriver(): RadioDriver {
  return new LoopbackRadioDriver(['loopback://a', 'loopback://b']);
}
