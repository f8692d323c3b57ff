import { describe, it, expect } from 'vitest';
import { MessageTracker } from './message-tracker.js';

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('MessageTracker', () => {
  describe('checkAndRecord', () => {
    it('returns true only for the first sighting of an id', () => {
      const tracker = new MessageTracker();
      const results = Array.from({ length: 5 }, () => tracker.checkAndRecord('m1', 'linkA'));

      expect(results).toEqual([true, false, false, false, false]);
      expect(tracker.size).toBe(1);
    });

    it('treats an id seen on the other link as a duplicate', () => {
      const tracker = new MessageTracker();
      expect(tracker.checkAndRecord('m1', 'linkA')).toBe(true);
      expect(tracker.checkAndRecord('m1', 'linkB')).toBe(false);
      expect(tracker.getRecent()[0].origin).toBe('linkA');
    });
  });

  describe('count bound', () => {
    it('never holds more than maxMessages and drops the oldest first', () => {
      const tracker = new MessageTracker({ maxMessages: 1000 });

      for (let i = 0; i < 1500; i++) {
        tracker.record(`id-${i}`, 'linkA', `text ${i}`);
        expect(tracker.size).toBeLessThanOrEqual(1000);
      }

      expect(tracker.size).toBe(1000);
      expect(tracker.hasSeen('id-0')).toBe(false);
      expect(tracker.hasSeen('id-499')).toBe(false);
      expect(tracker.hasSeen('id-500')).toBe(true);
      expect(tracker.hasSeen('id-1499')).toBe(true);
    });
  });

  describe('age bound', () => {
    it('forgets an id once the window has passed', () => {
      const clock = createClock();
      const tracker = new MessageTracker({ maxAgeMs: 600_000, now: clock.now });

      tracker.record('m1', 'linkA');
      clock.advance(600_000);
      expect(tracker.hasSeen('m1')).toBe(true);

      clock.advance(1);
      expect(tracker.hasSeen('m1')).toBe(false);
      expect(tracker.checkAndRecord('m1', 'linkB')).toBe(true);
    });

    it('only evicts records older than the window', () => {
      const clock = createClock();
      const tracker = new MessageTracker({ maxAgeMs: 1000, now: clock.now });

      tracker.record('old', 'linkA');
      clock.advance(600);
      tracker.record('new', 'linkB');
      clock.advance(500);

      expect(tracker.hasSeen('old')).toBe(false);
      expect(tracker.hasSeen('new')).toBe(true);
      expect(tracker.size).toBe(1);
    });
  });

  describe('record', () => {
    it('does not duplicate an existing id', () => {
      const tracker = new MessageTracker();
      tracker.record('m1', 'linkA', 'first');
      tracker.record('m1', 'linkB', 'second');

      expect(tracker.size).toBe(1);
      expect(tracker.getRecent()[0].summary).toBe('first');
      expect(tracker.getStats().totalSeen).toBe(1);
    });

    it('truncates long text in the summary', () => {
      const tracker = new MessageTracker();
      tracker.record('m1', 'linkA', 'x'.repeat(100));

      const [record] = tracker.getRecent();
      expect(record.summary).toHaveLength(80);
      expect(record.summary.endsWith('...')).toBe(true);
    });
  });

  describe('stats', () => {
    it('counts seen and forwarded messages', () => {
      const tracker = new MessageTracker({ maxMessages: 2 });
      tracker.checkAndRecord('a', 'linkA');
      tracker.checkAndRecord('b', 'linkA');
      tracker.checkAndRecord('c', 'linkB');

      expect(tracker.markForwarded('c')).toBe(true);
      expect(tracker.markForwarded('c')).toBe(true);
      expect(tracker.markForwarded('a')).toBe(false);

      expect(tracker.getStats()).toEqual({
        totalSeen: 3,
        totalForwarded: 1,
        currentlyTracked: 2,
      });
    });

    it('returns copies from getRecent', () => {
      const tracker = new MessageTracker();
      tracker.record('m1', 'linkA');
      const [record] = tracker.getRecent();
      record.forwarded = true;

      expect(tracker.getRecent()[0].forwarded).toBe(false);
    });

    it('limits getRecent to the newest entries', () => {
      const tracker = new MessageTracker();
      for (const id of ['a', 'b', 'c', 'd']) tracker.record(id, 'linkA');

      expect(tracker.getRecent(2).map((r) => r.id)).toEqual(['c', 'd']);
    });
  });
});
