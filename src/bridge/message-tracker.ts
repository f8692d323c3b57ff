/**
 * Message Tracker
 *
 * Remembers recently seen message ids so a message is forwarded at most
 * once, whichever link it arrives on and however many times the mesh
 * rebroadcasts it.
 *
 * Two independent bounds, both evicting oldest first:
 * - age: records older than maxAgeMs are dropped lazily on every access
 * - count: at maxMessages the oldest record makes room for the new one
 *
 * A Map keeps insertion order, so it serves as both the FIFO and the index.
 */

import type { LinkId, TrackerStats } from './types.js';

export interface MessageRecord {
  id: string;
  origin: LinkId;
  /** Message text, truncated for display */
  summary: string;
  /** Milliseconds from the tracker clock */
  timestamp: number;
  forwarded: boolean;
}

export interface MessageTrackerConfig {
  /** Dedup window in ms (default: 10 minutes) */
  maxAgeMs: number;
  /** Maximum tracked records (default: 1000) */
  maxMessages: number;
  /** Clock, injectable for tests */
  now: () => number;
}

export const DEFAULT_TRACKER_CONFIG: MessageTrackerConfig = {
  maxAgeMs: 10 * 60 * 1000,
  maxMessages: 1000,
  now: () => Date.now(),
};

const SUMMARY_LENGTH = 80;

export class MessageTracker {
  private readonly config: MessageTrackerConfig;
  private records = new Map<string, MessageRecord>();
  private totalSeen = 0;
  private totalForwarded = 0;

  constructor(config: Partial<MessageTrackerConfig> = {}) {
    this.config = { ...DEFAULT_TRACKER_CONFIG, ...config };
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Whether `id` is inside the dedup window. Runs an age cleanup first.
   */
  hasSeen(id: string): boolean {
    this.evictExpired();
    return this.records.has(id);
  }

  /**
   * Insert a record unless the id is already tracked.
   */
  record(id: string, origin: LinkId, text = ''): void {
    this.evictExpired();
    if (this.records.has(id)) return;
    this.insert(id, origin, text);
  }

  /**
   * Check and record in one step.
   *
   * Nothing between the lookup and the insert yields to the event loop, so
   * two deliveries of the same id can never both see "absent".
   *
   * @returns true if the id was not previously seen (and is now recorded)
   */
  checkAndRecord(id: string, origin: LinkId, text = ''): boolean {
    this.evictExpired();
    if (this.records.has(id)) return false;
    this.insert(id, origin, text);
    return true;
  }

  markForwarded(id: string): boolean {
    const record = this.records.get(id);
    if (!record) return false;
    if (!record.forwarded) {
      record.forwarded = true;
      this.totalForwarded++;
    }
    return true;
  }

  /**
   * Newest `count` records, oldest first.
   */
  getRecent(count = 50): MessageRecord[] {
    this.evictExpired();
    const all = Array.from(this.records.values());
    return all.slice(Math.max(0, all.length - count)).map((record) => ({ ...record }));
  }

  getStats(): TrackerStats {
    this.evictExpired();
    return {
      totalSeen: this.totalSeen,
      totalForwarded: this.totalForwarded,
      currentlyTracked: this.records.size,
    };
  }

  private insert(id: string, origin: LinkId, text: string): void {
    while (this.records.size >= this.config.maxMessages) {
      const oldest = this.records.keys().next();
      if (oldest.done) break;
      this.records.delete(oldest.value);
    }

    this.records.set(id, {
      id,
      origin,
      summary: text.length > SUMMARY_LENGTH ? `${text.slice(0, SUMMARY_LENGTH - 3)}...` : text,
      timestamp: this.config.now(),
      forwarded: false,
    });
    this.totalSeen++;
  }

  private evictExpired(): void {
    const cutoff = this.config.now() - this.config.maxAgeMs;
    for (const [id, record] of this.records) {
      if (record.timestamp >= cutoff) break;
      this.records.delete(id);
    }
  }
}
