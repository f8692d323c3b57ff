/**
 * Status reporting.
 *
 * The engine periodically turns its state into a StatusSnapshot and hands
 * it to a sink. The snapshot is a wire format read by external monitors
 * (see `mesh-bridge health`), so its keys are snake_case and stable.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { toErrorMessage } from './errors.js';
import type { BridgeStats, LinkCounters, LinkId, LinkState, LinkStatus } from './types.js';
import { createLogger, type Logger } from '../resiliency/logger.js';

export const DEFAULT_STATUS_FILE = '/tmp/mesh-bridge-status.json';
export const DEFAULT_STATUS_INTERVAL_MS = 30_000;
export const DEFAULT_STATUS_MAX_AGE_SECONDS = 120;

// =============================================================================
// Snapshot schema
// =============================================================================

const linkCountersSchema = z.object({
  received: z.number(),
  sent: z.number(),
  errors: z.number(),
});

const linkStatusSchema = z.enum(['disconnected', 'connecting', 'connected', 'recovering']);

export const statusSnapshotSchema = z.object({
  running: z.boolean(),
  links_connected: z.boolean(),
  uptime_seconds: z.number(),
  stats: z.object({
    linkA: linkCountersSchema,
    linkB: linkCountersSchema,
    duplicates_suppressed: z.number(),
    tracker: z.object({
      total_seen: z.number(),
      total_forwarded: z.number(),
      currently_tracked: z.number(),
    }),
  }),
  health_failures: z.object({ linkA: z.number(), linkB: z.number() }),
  timestamp: z.number(),
  ports: z.object({ linkA: z.string(), linkB: z.string() }),
  links: z.object({
    linkA: z.object({ status: linkStatusSchema, last_error: z.string().optional() }),
    linkB: z.object({ status: linkStatusSchema, last_error: z.string().optional() }),
  }),
});

export type StatusSnapshot = z.infer<typeof statusSnapshotSchema>;

export interface SnapshotInput {
  running: boolean;
  startedAtMs?: number;
  nowMs: number;
  stats: BridgeStats;
  links: Record<LinkId, LinkState>;
}

function copyCounters(counters: LinkCounters): LinkCounters {
  return { received: counters.received, sent: counters.sent, errors: counters.errors };
}

function linkEntry(state: LinkState): { status: LinkStatus; last_error?: string } {
  return state.lastError === undefined
    ? { status: state.status }
    : { status: state.status, last_error: state.lastError };
}

export function buildStatusSnapshot(input: SnapshotInput): StatusSnapshot {
  const { links, stats } = input;
  const uptimeMs = input.startedAtMs === undefined ? 0 : Math.max(0, input.nowMs - input.startedAtMs);

  return {
    running: input.running,
    links_connected: links.linkA.status === 'connected' && links.linkB.status === 'connected',
    uptime_seconds: Math.floor(uptimeMs / 1000),
    stats: {
      linkA: copyCounters(stats.linkA),
      linkB: copyCounters(stats.linkB),
      duplicates_suppressed: stats.duplicatesSuppressed,
      tracker: {
        total_seen: stats.tracker.totalSeen,
        total_forwarded: stats.tracker.totalForwarded,
        currently_tracked: stats.tracker.currentlyTracked,
      },
    },
    health_failures: {
      linkA: links.linkA.consecutiveHealthFailures,
      linkB: links.linkB.consecutiveHealthFailures,
    },
    timestamp: Math.floor(input.nowMs / 1000),
    ports: { linkA: links.linkA.port, linkB: links.linkB.port },
    links: { linkA: linkEntry(links.linkA), linkB: linkEntry(links.linkB) },
  };
}

// =============================================================================
// Sinks
// =============================================================================

export interface StatusSink {
  write(snapshot: StatusSnapshot): Promise<void>;
}

/**
 * Writes the snapshot as JSON. The file is replaced atomically (temp file
 * plus rename) so readers never see a partial document.
 */
export class FileStatusSink implements StatusSink {
  readonly filePath: string;

  constructor(filePath: string = DEFAULT_STATUS_FILE) {
    this.filePath = filePath;
  }

  async write(snapshot: StatusSnapshot): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}

export class LogStatusSink implements StatusSink {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('status')) {
    this.logger = logger;
  }

  async write(snapshot: StatusSnapshot): Promise<void> {
    this.logger.info('Bridge status', {
      running: snapshot.running,
      linksConnected: snapshot.links_connected,
      uptimeSeconds: snapshot.uptime_seconds,
      linkA: snapshot.stats.linkA,
      linkB: snapshot.stats.linkB,
      duplicatesSuppressed: snapshot.stats.duplicates_suppressed,
    });
  }
}

// =============================================================================
// Reporter
// =============================================================================

export interface StatusReporterConfig {
  intervalMs: number;
}

export class StatusReporter {
  private readonly getSnapshot: () => StatusSnapshot;
  private readonly sinks: StatusSink[];
  private readonly config: StatusReporterConfig;
  private readonly logger: Logger;
  private timer?: NodeJS.Timeout;

  constructor(
    getSnapshot: () => StatusSnapshot,
    sinks: StatusSink[],
    config: Partial<StatusReporterConfig> = {},
    logger: Logger = createLogger('status')
  ) {
    this.getSnapshot = getSnapshot;
    this.sinks = sinks;
    this.config = { intervalMs: DEFAULT_STATUS_INTERVAL_MS, ...config };
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Write one snapshot right away, then every intervalMs.
   */
  async start(): Promise<void> {
    if (this.timer) return;
    await this.report();
    this.timer = setInterval(() => {
      this.report().catch((err: unknown) => {
        this.logger.error('Status report failed', { error: toErrorMessage(err) });
      });
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Hand the current snapshot to every sink. A failing sink is logged and
   * does not affect the others.
   */
  async report(): Promise<StatusSnapshot> {
    const snapshot = this.getSnapshot();
    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.write(snapshot);
        } catch (err) {
          this.logger.warn('Status sink write failed', { error: toErrorMessage(err) });
        }
      })
    );
    return snapshot;
  }
}

// =============================================================================
// Evaluation (for external health checks)
// =============================================================================

export type HealthLevel = 'OK' | 'WARNING' | 'CRITICAL';

export interface StatusEvaluation {
  level: HealthLevel;
  message: string;
}

export const HEALTH_EXIT_CODES: Record<HealthLevel, number> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
};

export function formatUptime(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export function evaluateStatus(
  snapshot: StatusSnapshot,
  nowSeconds: number,
  maxAgeSeconds: number = DEFAULT_STATUS_MAX_AGE_SECONDS
): StatusEvaluation {
  const age = Math.floor(nowSeconds - snapshot.timestamp);
  if (age > maxAgeSeconds) {
    return {
      level: 'CRITICAL',
      message: `Status file is stale (${age}s old, max ${maxAgeSeconds}s)`,
    };
  }

  if (!snapshot.running) {
    return { level: 'CRITICAL', message: 'Bridge is not running' };
  }

  if (!snapshot.links_connected) {
    const down = (['linkA', 'linkB'] as const)
      .filter((link) => snapshot.links[link].status !== 'connected')
      .map((link) => `${link}=${snapshot.links[link].status}`);
    return { level: 'CRITICAL', message: `Links not connected (${down.join(', ')})` };
  }

  const errors = `Errors: A=${snapshot.stats.linkA.errors} B=${snapshot.stats.linkB.errors}`;
  const uptime = `Uptime: ${formatUptime(snapshot.uptime_seconds)}`;
  // Error counters are lifetime totals; only a failing probe means degraded now
  const failing = snapshot.health_failures.linkA > 0 || snapshot.health_failures.linkB > 0;

  if (failing) {
    const probes = `Probe failures: A=${snapshot.health_failures.linkA} B=${snapshot.health_failures.linkB}`;
    return { level: 'WARNING', message: `Bridge degraded - ${uptime} - ${errors} - ${probes}` };
  }

  return { level: 'OK', message: `Bridge healthy - ${uptime} - ${errors}` };
}
