/**
 * Bridge Engine
 *
 * Relays text messages between two radio links, each message at most once.
 *
 *   radio A ──onMessage──▶ parse ──▶ tracker.checkAndRecord ──▶ link B.send
 *   radio B ──onMessage──▶ parse ──▶ tracker.checkAndRecord ──▶ link A.send
 *
 * The dedup decision is made synchronously inside the receive callback, so
 * it is atomic across both links. Sends are queued per source link: one
 * link's messages go out in arrival order, the two directions run
 * independently. A failed send is counted and logged, never retried.
 *
 * Lifecycle:
 *   idle -> starting -> running -> stopping -> stopped
 */

import crypto from 'node:crypto';
import { ConnectionManager, type ConnectionManagerConfig } from './connection-manager.js';
import { ProtocolError, toErrorMessage } from './errors.js';
import { RadioLink } from './link.js';
import { MessageTracker, type MessageRecord, type MessageTrackerConfig } from './message-tracker.js';
import { parsePacket } from './packet.js';
import {
  StatusReporter,
  buildStatusSnapshot,
  type StatusSink,
  type StatusSnapshot,
} from './status.js';
import {
  LINK_IDS,
  otherLink,
  type BridgeStats,
  type LinkCounters,
  type LinkId,
  type LinkState,
  type MeshMessage,
  type NodeInfo,
  type RadioDriver,
  type RadioPacket,
} from './types.js';
import { LinkHealthMonitor, type HealthMonitorConfig } from '../resiliency/health-monitor.js';
import { createLogger, type Logger } from '../resiliency/logger.js';
import { withTimeout, type SleepFn } from '../utils/sleep.js';

export interface BridgeEngineConfig {
  ports: Record<LinkId, string>;
  tracker?: Partial<Pick<MessageTrackerConfig, 'maxAgeMs' | 'maxMessages'>>;
  connection?: Partial<ConnectionManagerConfig>;
  health?: Partial<HealthMonitorConfig>;
  /** Status report interval (ms, default: 30 seconds) */
  statusIntervalMs?: number;
  /** Health probe timeout (ms, default: 10 seconds) */
  probeTimeoutMs?: number;
  /** Per-message send timeout (ms, default: 10 seconds) */
  sendTimeoutMs?: number;
  /** Upper bound on waiting for in-flight forwards during stop (ms, default: 5 seconds) */
  shutdownTimeoutMs?: number;
}

export interface BridgeEngineDeps {
  driver: RadioDriver;
  statusSinks?: StatusSink[];
  sleep?: SleepFn;
  now?: () => number;
  logger?: Logger;
}

export type EnginePhase = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

function emptyCounters(): LinkCounters {
  return { received: 0, sent: 0, errors: 0 };
}

/**
 * Configuration advice for a radio joining the bridge.
 */
export function nodeInfoRecommendations(info: NodeInfo): string[] {
  const recommendations: string[] = [];
  const primary = info.channels?.find((channel) => channel.index === 0);
  if (primary && primary.role !== 'PRIMARY') {
    recommendations.push('Channel 0 should be set to PRIMARY role');
  }
  return recommendations;
}

export class BridgeEngine {
  readonly tracker: MessageTracker;
  readonly healthMonitor: LinkHealthMonitor;
  private readonly managers: Record<LinkId, ConnectionManager>;
  private readonly reporter: StatusReporter;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly shutdownTimeoutMs: number;

  private phase: EnginePhase = 'idle';
  private startedAtMs?: number;
  private counters: Record<LinkId, LinkCounters> = {
    linkA: emptyCounters(),
    linkB: emptyCounters(),
  };
  private duplicatesSuppressed = 0;
  private forwardQueues: Record<LinkId, Promise<void>> = {
    linkA: Promise.resolve(),
    linkB: Promise.resolve(),
  };

  private shutdownRequested = false;
  private resolveShutdown: () => void = () => undefined;
  private readonly shutdownSignal: Promise<void>;
  private stopping?: Promise<void>;

  constructor(config: BridgeEngineConfig, deps: BridgeEngineDeps) {
    this.logger = deps.logger ?? createLogger('engine');
    this.now = deps.now ?? (() => Date.now());
    this.shutdownTimeoutMs = config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

    this.tracker = new MessageTracker({ ...config.tracker, now: this.now });
    this.healthMonitor = new LinkHealthMonitor(config.health, { sleep: deps.sleep });

    const createManager = (id: LinkId): ConnectionManager => {
      const link = new RadioLink(deps.driver, {
        id,
        port: config.ports[id],
        probeTimeoutMs: config.probeTimeoutMs,
        sendTimeoutMs: config.sendTimeoutMs,
      });
      link.onMessage((packet) => this.handleInbound(id, packet));
      const manager = new ConnectionManager(link, config.connection, { sleep: deps.sleep });

      // Startup reports node info itself; this covers reconnects while running
      let previous = manager.status;
      manager.onStateChange((state) => {
        const reconnected = state.status === 'connected' && previous !== 'connected';
        previous = state.status;
        if (reconnected && this.phase === 'running') {
          void this.reportNodeInfo(id);
        }
      });
      return manager;
    };
    this.managers = { linkA: createManager('linkA'), linkB: createManager('linkB') };

    for (const id of LINK_IDS) {
      this.healthMonitor.register(this.managers[id]);
    }

    this.reporter = new StatusReporter(
      () => this.getStatusSnapshot(),
      deps.statusSinks ?? [],
      { intervalMs: config.statusIntervalMs }
    );

    this.shutdownSignal = new Promise<void>((resolve) => {
      this.resolveShutdown = resolve;
    });
  }

  get state(): EnginePhase {
    return this.phase;
  }

  get isRunning(): boolean {
    return this.phase === 'running';
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  /**
   * Connect link A, then link B, then start monitoring and reporting.
   *
   * @throws ConnectionError when a link cannot be opened within its retries;
   *   link A is closed again if link B fails.
   */
  async start(): Promise<void> {
    if (this.phase !== 'idle') {
      throw new Error(`Cannot start bridge in state ${this.phase}`);
    }
    this.phase = 'starting';
    this.logger.info('Starting bridge', {
      linkA: this.managers.linkA.link.port,
      linkB: this.managers.linkB.link.port,
    });

    await this.managers.linkA.connect();
    await this.reportNodeInfo('linkA');
    try {
      await this.managers.linkB.connect();
    } catch (err) {
      await this.managers.linkA.stop();
      throw err;
    }
    await this.reportNodeInfo('linkB');

    this.startedAtMs = this.now();
    this.phase = 'running';
    this.healthMonitor.start();
    await this.reporter.start();
    this.logger.info('Bridge is now running');
  }

  /**
   * Start, wait for requestShutdown(), stop. Rejects only for a fatal
   * startup failure, which the process supervisor is expected to handle.
   */
  async run(): Promise<void> {
    try {
      await this.start();
    } catch (err) {
      await this.stop();
      if (this.shutdownRequested) {
        this.logger.info('Startup interrupted by shutdown');
        return;
      }
      this.logger.fatal('Bridge failed to start', { error: toErrorMessage(err) });
      throw err;
    }

    await this.shutdownSignal;
    await this.stop();
  }

  /**
   * Ask the engine to stop. Safe to call any number of times.
   */
  requestShutdown(): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    this.logger.info('Shutdown requested', { phase: this.phase });

    if (this.phase === 'starting') {
      // Cut a connect backoff short; start() then rejects and run() returns
      for (const id of LINK_IDS) {
        this.managers[id].stop().catch((err: unknown) => {
          this.logger.warn('Error cancelling connection', { link: id, error: toErrorMessage(err) });
        });
      }
    }

    this.resolveShutdown();
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const wasRunning = this.phase === 'running';
    this.phase = 'stopping';
    this.healthMonitor.stop();
    this.reporter.stop();

    try {
      await withTimeout(
        Promise.all([this.forwardQueues.linkA, this.forwardQueues.linkB]),
        this.shutdownTimeoutMs,
        `In-flight forwards did not finish within ${this.shutdownTimeoutMs}ms`
      );
    } catch (err) {
      this.logger.warn('Abandoning in-flight forwards', { error: toErrorMessage(err) });
    }

    await Promise.all(
      LINK_IDS.map(async (id) => {
        try {
          await this.managers[id].stop();
        } catch (err) {
          this.logger.error('Error closing link', { link: id, error: toErrorMessage(err) });
        }
      })
    );

    this.phase = 'stopped';
    if (wasRunning) {
      await this.reporter.report();
    }
    this.logger.info('Bridge stopped', { stats: this.getStats() });
  }

  // ─── Forwarding ───────────────────────────────────────────────────

  /**
   * Receive-callback entry point for packets heard on `source`.
   */
  handleInbound(source: LinkId, packet: RadioPacket): void {
    let message: MeshMessage;
    try {
      const parsed = parsePacket(packet, source);
      if (parsed.kind === 'ignored') {
        this.logger.debug('Ignoring non-text packet', { link: source, portnum: parsed.portnum });
        return;
      }
      message = parsed.message;
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      this.counters[source].errors++;
      this.logger.warn('Dropping malformed packet', { link: source, error: err.message });
      return;
    }

    if (!this.tracker.checkAndRecord(message.id, source, message.text)) {
      this.duplicatesSuppressed++;
      this.logger.debug('Already seen message, skipping', { link: source, id: message.id });
      return;
    }

    this.counters[source].received++;
    this.logger.info('Received message', {
      link: source,
      id: message.id,
      from: message.from,
      to: message.to,
      channel: message.channel,
    });

    this.forwardQueues[source] = this.forwardQueues[source].then(() => this.forward(source, message));
  }

  /**
   * Wait until every forward queued so far has finished.
   */
  async flush(): Promise<void> {
    await Promise.all([this.forwardQueues.linkA, this.forwardQueues.linkB]);
  }

  private async forward(source: LinkId, message: MeshMessage): Promise<void> {
    const target = otherLink(source);
    try {
      await this.managers[target].link.send(message);
      this.counters[target].sent++;
      this.tracker.markForwarded(message.id);
      this.logger.info('Forwarded message', { from: source, to: target, id: message.id });
    } catch (err) {
      this.counters[target].errors++;
      this.logger.error('Failed to forward message', {
        from: source,
        to: target,
        id: message.id,
        error: toErrorMessage(err),
      });
    }
  }

  /**
   * Operator send through one link.
   *
   * @returns false when the send failed (logged and counted)
   */
  async sendText(link: LinkId, text: string, channel = 0): Promise<boolean> {
    const message: MeshMessage = {
      id: crypto.randomUUID(),
      from: 'local',
      to: '^all',
      text,
      channel,
    };

    try {
      await this.managers[link].link.send(message);
      this.counters[link].sent++;
      this.logger.info('Sent message', { link, channel });
      return true;
    } catch (err) {
      this.counters[link].errors++;
      this.logger.error('Failed to send message', { link, error: toErrorMessage(err) });
      return false;
    }
  }

  // ─── Introspection ────────────────────────────────────────────────

  /**
   * Identity of the radio on `link`, or undefined when it is not connected
   * or its driver has no way to report it. Rejects when the radio does not
   * answer.
   */
  async getNodeInfo(link: LinkId): Promise<NodeInfo | undefined> {
    return this.managers[link].link.getNodeInfo();
  }

  /**
   * Log the identity of a freshly connected radio. Never throws; a radio
   * that cannot report its identity still bridges.
   */
  private async reportNodeInfo(link: LinkId): Promise<void> {
    let info: NodeInfo | undefined;
    try {
      info = await this.getNodeInfo(link);
    } catch (err) {
      this.logger.debug('Node info unavailable', { link, error: toErrorMessage(err) });
      return;
    }
    if (!info) return;

    this.logger.info('Radio identified', {
      link,
      nodeId: info.nodeId,
      hwModel: info.hwModel ?? 'unknown',
      firmware: info.firmwareVersion,
    });
    for (const recommendation of nodeInfoRecommendations(info)) {
      this.logger.warn('Radio configuration', { link, recommendation });
    }
  }

  getStats(): BridgeStats {
    return {
      linkA: { ...this.counters.linkA },
      linkB: { ...this.counters.linkB },
      duplicatesSuppressed: this.duplicatesSuppressed,
      tracker: this.tracker.getStats(),
    };
  }

  getLinkStates(): Record<LinkId, LinkState> {
    return {
      linkA: this.managers.linkA.getState(),
      linkB: this.managers.linkB.getState(),
    };
  }

  getConnectionManager(link: LinkId): ConnectionManager {
    return this.managers[link];
  }

  getRecentMessages(count?: number): MessageRecord[] {
    return this.tracker.getRecent(count);
  }

  getStatusSnapshot(): StatusSnapshot {
    return buildStatusSnapshot({
      running: this.phase === 'running',
      startedAtMs: this.startedAtMs,
      nowMs: this.now(),
      stats: this.getStats(),
      links: this.getLinkStates(),
    });
  }
}
