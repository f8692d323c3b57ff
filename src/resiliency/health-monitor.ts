/**
 * Link Health Monitor
 *
 * Probes every registered link on a fixed interval, independent of message
 * traffic, and escalates when a link stays unresponsive:
 *
 *   probe ok            -> failures = 0, link marked connected
 *   probe failed, n < T -> failures = n, warning only
 *   probe failed, n = T -> reboot radio, settle, reconnect; failures = 0
 *
 * When the reboot is unsupported or fails, the monitor reconnects right
 * away. A reconnect that exhausts its retries is logged and left alone;
 * the next cycle starts counting again from zero.
 *
 * Each link is checked on its own: while one link is being recovered the
 * other keeps being probed, and a link is never checked twice at once.
 */

import { EventEmitter } from 'node:events';
import { createLogger, type Logger } from './logger.js';
import { toErrorMessage } from '../bridge/errors.js';
import type { LinkId } from '../bridge/types.js';
import { AbortedError, sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';

/**
 * What the monitor needs from a link. The connection manager implements it.
 */
export interface HealthTarget {
  readonly id: LinkId;
  probe(): Promise<boolean>;
  requestReboot(): Promise<void>;
  reconnect(): Promise<void>;
  recordHealthSuccess(): void;
  recordHealthFailure(): number;
  resetHealthFailures(): void;
  markRecovering(reason: string): void;
}

export interface HealthMonitorConfig {
  /** Probe interval (ms, default: 60 seconds) */
  checkIntervalMs: number;
  /** Consecutive failed probes before escalating (default: 3) */
  failureThreshold: number;
  /** Wait after an accepted reboot before reconnecting (ms, default: 10 seconds) */
  rebootSettleMs: number;
}

export const DEFAULT_HEALTH_CONFIG: HealthMonitorConfig = {
  checkIntervalMs: 60_000,
  failureThreshold: 3,
  rebootSettleMs: 10_000,
};

export interface HealthMonitorDeps {
  sleep?: SleepFn;
  logger?: Logger;
}

export type HealthCheckOutcome = 'healthy' | 'unhealthy' | 'recovered' | 'recovery_failed' | 'skipped';

export class LinkHealthMonitor extends EventEmitter {
  private readonly config: HealthMonitorConfig;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;
  private targets = new Map<LinkId, HealthTarget>();
  private failureCounts = new Map<LinkId, number>();
  private busy = new Set<LinkId>();
  private timer?: NodeJS.Timeout;
  private abort = new AbortController();

  constructor(config: Partial<HealthMonitorConfig> = {}, deps: HealthMonitorDeps = {}) {
    super();
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config };
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? createLogger('health');
  }

  register(target: HealthTarget): void {
    this.targets.set(target.id, target);
    this.failureCounts.set(target.id, 0);
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    if (this.abort.signal.aborted) {
      this.abort = new AbortController();
    }

    this.logger.info('Health monitor started', {
      intervalMs: this.config.checkIntervalMs,
      failureThreshold: this.config.failureThreshold,
    });

    this.timer = setInterval(() => {
      this.checkAll().catch((err: unknown) => {
        this.logger.error('Health check cycle failed', { error: toErrorMessage(err) });
      });
    }, this.config.checkIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('Health monitor stopped');
    }
    // Cut short any post-reboot settle wait
    this.abort.abort();
  }

  /**
   * Run one cycle over every link not already being checked.
   */
  async checkAll(): Promise<Map<LinkId, HealthCheckOutcome>> {
    const entries = Array.from(this.targets.values());
    const outcomes = await Promise.all(entries.map((target) => this.check(target)));
    return new Map(entries.map((target, i) => [target.id, outcomes[i]]));
  }

  getFailureCounts(): Record<LinkId, number> {
    return {
      linkA: this.failureCounts.get('linkA') ?? 0,
      linkB: this.failureCounts.get('linkB') ?? 0,
    };
  }

  private async check(target: HealthTarget): Promise<HealthCheckOutcome> {
    if (this.busy.has(target.id)) {
      this.logger.debug('Previous check still running, skipping', { link: target.id });
      return 'skipped';
    }

    this.busy.add(target.id);
    try {
      return await this.runCheck(target);
    } finally {
      this.busy.delete(target.id);
    }
  }

  private async runCheck(target: HealthTarget): Promise<HealthCheckOutcome> {
    let responsive: boolean;
    try {
      responsive = await target.probe();
    } catch (err) {
      this.logger.debug('Probe threw', { link: target.id, error: toErrorMessage(err) });
      responsive = false;
    }

    if (this.abort.signal.aborted) {
      this.logger.debug('Monitor stopped during probe, ignoring result', { link: target.id });
      return 'skipped';
    }

    if (responsive) {
      const previous = this.failureCounts.get(target.id) ?? 0;
      target.recordHealthSuccess();
      this.failureCounts.set(target.id, 0);
      if (previous > 0) {
        this.logger.info('Link responsive again', { link: target.id, previousFailures: previous });
      }
      this.emit('healthy', { link: target.id });
      return 'healthy';
    }

    const failures = target.recordHealthFailure();
    this.failureCounts.set(target.id, failures);

    if (failures < this.config.failureThreshold) {
      this.logger.warn('Health probe failed', {
        link: target.id,
        consecutiveFailures: failures,
        threshold: this.config.failureThreshold,
      });
      this.emit('unhealthy', { link: target.id, consecutiveFailures: failures });
      return 'unhealthy';
    }

    return this.escalate(target, failures);
  }

  private async escalate(target: HealthTarget, failures: number): Promise<HealthCheckOutcome> {
    const reason = `${failures} consecutive failed health probes`;
    target.markRecovering(reason);
    this.logger.warn('Escalating link recovery', { link: target.id, consecutiveFailures: failures });
    this.emit('escalating', { link: target.id, consecutiveFailures: failures });

    try {
      let rebooted = false;
      try {
        await target.requestReboot();
        rebooted = true;
        this.logger.info('Reboot requested', { link: target.id, settleMs: this.config.rebootSettleMs });
      } catch (err) {
        this.logger.warn('Reboot not possible, reconnecting directly', {
          link: target.id,
          error: toErrorMessage(err),
        });
        this.emit('rebootFailed', { link: target.id, error: toErrorMessage(err) });
      }

      if (rebooted) {
        await this.sleep(this.config.rebootSettleMs, this.abort.signal);
      }

      await target.reconnect();
      this.logger.info('Link recovered', { link: target.id, rebooted });
      this.emit('recovered', { link: target.id, rebooted });
      return 'recovered';
    } catch (err) {
      if (err instanceof AbortedError) {
        this.logger.info('Recovery interrupted by shutdown', { link: target.id });
        return 'recovery_failed';
      }
      this.logger.error('Recovery failed; link stays disconnected until the next check', {
        link: target.id,
        error: toErrorMessage(err),
      });
      this.emit('recoveryFailed', { link: target.id, error: toErrorMessage(err) });
      return 'recovery_failed';
    } finally {
      target.resetHealthFailures();
      this.failureCounts.set(target.id, 0);
    }
  }
}
