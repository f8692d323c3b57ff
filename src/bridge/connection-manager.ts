/**
 * Connection Manager
 *
 * Owns one RadioLink's lifecycle and its LinkState.
 *
 * States:
 *   disconnected -> connecting -> connected -> disconnected   (fatal error)
 *                                 connected -> recovering -> connected | disconnected
 *
 * Opening is retried with exponential backoff: before attempt n (n >= 2)
 * the manager sleeps initialDelayMs * 2^(n-2). There is no sleep before the
 * first attempt or after the last one. When every attempt fails the caller
 * gets a ConnectionError.
 */

import { ConnectionError, toErrorMessage } from './errors.js';
import type { RadioLink } from './link.js';
import type { LinkId, LinkState, LinkStatus } from './types.js';
import { AbortedError, sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import { createLogger, type Logger } from '../resiliency/logger.js';
import type { HealthTarget } from '../resiliency/health-monitor.js';

export interface ConnectionManagerConfig {
  /** Total open attempts per connect/reconnect (default: 5) */
  maxRetries: number;
  /** Delay before the first retry, doubled for each later one (default: 2s) */
  initialDelayMs: number;
  /** Start a reconnect on its own when the driver reports the link lost (default: true) */
  reconnectOnDisconnect: boolean;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionManagerConfig = {
  maxRetries: 5,
  initialDelayMs: 2000,
  reconnectOnDisconnect: true,
};

export interface ConnectionManagerDeps {
  sleep?: SleepFn;
  logger?: Logger;
}

type AttemptMode = 'connect' | 'reconnect';

/**
 * Backoff delays between attempts: [d, 2d, 4d, ...], one fewer than attempts.
 */
export function backoffSchedule(initialDelayMs: number, maxRetries: number): number[] {
  return Array.from({ length: Math.max(0, maxRetries - 1) }, (_, i) => initialDelayMs * 2 ** i);
}

export class ConnectionManager implements HealthTarget {
  readonly link: RadioLink;
  private readonly config: ConnectionManagerConfig;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  private state: LinkState;
  private inFlight?: Promise<void>;
  private abort = new AbortController();
  private stopped = false;
  private stateListeners = new Set<(state: LinkState) => void>();

  constructor(link: RadioLink, config: Partial<ConnectionManagerConfig> = {}, deps: ConnectionManagerDeps = {}) {
    this.link = link;
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? createLogger('connection');
    this.state = {
      status: 'disconnected',
      consecutiveHealthFailures: 0,
      port: link.port,
    };

    this.link.onDisconnect((reason) => this.handleLinkLost(reason));
  }

  get id(): LinkId {
    return this.link.id;
  }

  get status(): LinkStatus {
    return this.state.status;
  }

  getState(): LinkState {
    return { ...this.state };
  }

  onStateChange(listener: (state: LinkState) => void): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  /**
   * Initial connect. Rejects with ConnectionError once retries are exhausted.
   */
  connect(): Promise<void> {
    return this.exclusive('connect');
  }

  /**
   * Re-establish the link after a reboot or a lost connection. Same retry
   * policy as connect(); the link reports `recovering` meanwhile.
   */
  reconnect(): Promise<void> {
    return this.exclusive('reconnect');
  }

  /**
   * Stop for good: abort any backoff sleep and close the link.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.abort.abort();

    const pending = this.inFlight;
    if (pending) {
      // The aborted attempt rejects with ConnectionError; stop() only waits for it
      await pending.catch((err: unknown) => {
        this.logger.debug('Pending connection attempt ended by stop', {
          link: this.id,
          error: toErrorMessage(err),
        });
      });
    }

    await this.link.close();
    this.setStatus('disconnected');
  }

  // ─── Health bookkeeping (driven by the health monitor) ─────────────

  recordHealthSuccess(): void {
    this.state.consecutiveHealthFailures = 0;
    if (this.state.status !== 'connected' && this.link.isOpen) {
      this.setStatus('connected');
    }
  }

  recordHealthFailure(): number {
    this.state.consecutiveHealthFailures++;
    this.notify();
    return this.state.consecutiveHealthFailures;
  }

  resetHealthFailures(): void {
    this.state.consecutiveHealthFailures = 0;
    this.notify();
  }

  markRecovering(reason: string): void {
    this.state.lastError = reason;
    this.setStatus('recovering');
  }

  probe(): Promise<boolean> {
    return this.link.isResponsive();
  }

  requestReboot(): Promise<void> {
    return this.link.requestReboot();
  }

  // ─── Internals ────────────────────────────────────────────────────

  /**
   * connect/reconnect never overlap for one link: a second caller joins the
   * attempt already in flight.
   */
  private exclusive(mode: AttemptMode): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Joining in-flight connection attempt', { link: this.id, mode });
      return this.inFlight;
    }

    const attempt = this.runAttempts(mode).finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = attempt;
    return attempt;
  }

  private async runAttempts(mode: AttemptMode): Promise<void> {
    if (this.stopped) {
      throw new ConnectionError(`Link ${this.id} is stopped`, { link: this.id });
    }

    this.setStatus(mode === 'connect' ? 'connecting' : 'recovering');
    this.logger.info(mode === 'connect' ? 'Connecting' : 'Reconnecting', {
      link: this.id,
      port: this.link.port,
      maxRetries: this.config.maxRetries,
    });

    if (mode === 'reconnect') {
      await this.link.close();
    }

    const delays = backoffSchedule(this.config.initialDelayMs, this.config.maxRetries);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 1) {
        if (this.stopped) break;
        const delay = delays[attempt - 2];
        this.logger.info('Retrying after backoff', { link: this.id, attempt, delayMs: delay });
        try {
          await this.sleep(delay, this.abort.signal);
        } catch (err) {
          if (err instanceof AbortedError) break;
          throw err;
        }
        // Release whatever a failed attempt may have left half-open
        await this.link.close();
      }

      if (this.stopped) break;

      try {
        await this.link.open();
        this.state.lastError = undefined;
        this.setStatus('connected');
        this.logger.info('Connected', { link: this.id, port: this.link.port, attempt });
        return;
      } catch (err) {
        lastError = err;
        this.state.lastError = toErrorMessage(err);
        this.logger.warn('Connection attempt failed', {
          link: this.id,
          port: this.link.port,
          attempt,
          maxRetries: this.config.maxRetries,
          error: this.state.lastError,
        });
      }
    }

    this.setStatus('disconnected');

    if (this.stopped) {
      throw new ConnectionError(`Connection to ${this.link.port} aborted by shutdown`, {
        link: this.id,
        cause: lastError,
      });
    }

    this.logger.error(mode === 'connect' ? 'Connect retries exhausted' : 'Reconnect retries exhausted', {
      link: this.id,
      port: this.link.port,
      attempts: this.config.maxRetries,
      error: this.state.lastError,
    });
    throw new ConnectionError(
      `Failed to open ${this.link.port} after ${this.config.maxRetries} attempts: ${this.state.lastError ?? 'unknown error'}`,
      { link: this.id, cause: lastError }
    );
  }

  private handleLinkLost(reason: Error): void {
    this.state.lastError = reason.message;
    this.setStatus('disconnected');
    this.logger.warn('Link lost', { link: this.id, port: this.link.port, reason: reason.message });

    if (this.stopped || !this.config.reconnectOnDisconnect) return;

    this.reconnect().catch((err: unknown) => {
      this.logger.error('Automatic reconnect failed; waiting for the health monitor', {
        link: this.id,
        error: toErrorMessage(err),
      });
    });
  }

  private setStatus(status: LinkStatus): void {
    if (this.state.status !== status) {
      this.logger.debug('Link status changed', { link: this.id, from: this.state.status, to: status });
    }
    this.state.status = status;
    this.notify();
  }

  private notify(): void {
    const snapshot = this.getState();
    for (const listener of this.stateListeners) listener(snapshot);
  }
}
