/**
 * Shared bridge types: link identity, messages, the radio driver contract
 * and the statistics shapes.
 */

export type LinkId = 'linkA' | 'linkB';

export const LINK_IDS: readonly LinkId[] = ['linkA', 'linkB'];

export function otherLink(link: LinkId): LinkId {
  return link === 'linkA' ? 'linkB' : 'linkA';
}

/** A validated text message, forwarded verbatim to the opposite link. */
export interface MeshMessage {
  id: string;
  from: string;
  to: string;
  text: string;
  channel: number;
}

/**
 * Packet as handed over by a driver. Drivers are external code, so the
 * engine validates the shape before trusting it.
 */
export type RadioPacket = unknown;

// =============================================================================
// Radio collaborator contract
// =============================================================================

export interface RadioConnection {
  close(): Promise<void>;
  send(message: MeshMessage): Promise<void>;
  /** Register a receive handler. Returns an unsubscribe function. */
  onReceive(handler: (packet: RadioPacket) => void): () => void;
  /** Cheap liveness probe, e.g. querying cached device identity. */
  isResponsive(): Promise<boolean>;
  /**
   * Ask the radio to reboot. Drivers reject with UnsupportedError when the
   * device cannot do it, or CommandError when the command failed.
   */
  requestReboot(): Promise<void>;
  /** Notified when the underlying transport is lost. */
  onDisconnect?(handler: (reason: Error) => void): () => void;
  /** Identity and channel layout of the attached radio, where the driver can read it. */
  getNodeInfo?(): Promise<NodeInfo>;
}

export type ChannelRole = 'PRIMARY' | 'SECONDARY' | 'DISABLED';

export interface ChannelInfo {
  index: number;
  name: string;
  role: ChannelRole;
}

export interface NodeInfo {
  nodeId: string;
  hwModel?: string;
  firmwareVersion?: string;
  channels?: ChannelInfo[];
}

export interface RadioDriver {
  readonly name: string;
  open(port: string): Promise<RadioConnection>;
  /** Ports this driver can see, merged into serial port discovery. */
  listPorts?(): Promise<string[]>;
}

// =============================================================================
// Link state
// =============================================================================

export type LinkStatus = 'disconnected' | 'connecting' | 'connected' | 'recovering';

export interface LinkState {
  status: LinkStatus;
  consecutiveHealthFailures: number;
  lastError?: string;
  port: string;
}

// =============================================================================
// Statistics
// =============================================================================

export interface LinkCounters {
  received: number;
  sent: number;
  errors: number;
}

export interface TrackerStats {
  totalSeen: number;
  totalForwarded: number;
  currentlyTracked: number;
}

export interface BridgeStats {
  linkA: LinkCounters;
  linkB: LinkCounters;
  duplicatesSuppressed: number;
  tracker: TrackerStats;
}
