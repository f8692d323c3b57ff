import { describe, it, expect, vi, afterEach } from 'vitest';
import { BridgeEngine, nodeInfoRecommendations, type BridgeEngineConfig } from './engine.js';
import { ConnectionError } from './errors.js';
import type { StatusSink, StatusSnapshot } from './status.js';
import type { NodeInfo } from './types.js';
import { LoopbackRadioDriver } from '../drivers/loopback.js';
import { configure, createLogger, type Logger } from '../resiliency/logger.js';
import { AbortedError, type SleepFn } from '../utils/sleep.js';

configure({ quiet: true });

const PORT_A = '/dev/ttyUSB0';
const PORT_B = '/dev/ttyUSB1';

class MemorySink implements StatusSink {
  readonly snapshots: StatusSnapshot[] = [];

  async write(snapshot: StatusSnapshot): Promise<void> {
    this.snapshots.push(snapshot);
  }

  get last(): StatusSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }
}

const engines: BridgeEngine[] = [];

function createHarness(
  options: { config?: Partial<BridgeEngineConfig>; sleep?: SleepFn; logger?: Logger } = {}
) {
  const driver = new LoopbackRadioDriver();
  const radioA = driver.radio(PORT_A);
  const radioB = driver.radio(PORT_B);
  const sink = new MemorySink();
  let clock = 1_700_000_000_000;
  const noSleep: SleepFn = async () => undefined;

  const engine = new BridgeEngine(
    { ports: { linkA: PORT_A, linkB: PORT_B }, ...options.config },
    {
      driver,
      statusSinks: [sink],
      sleep: options.sleep ?? noSleep,
      now: () => clock,
      logger: options.logger,
    }
  );
  engines.push(engine);

  return {
    engine,
    driver,
    radioA,
    radioB,
    sink,
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

const hello = { id: 'm1', from: '!A1', to: '^all', text: 'hi' };

describe('BridgeEngine', () => {
  afterEach(async () => {
    await Promise.all(engines.splice(0).map((engine) => engine.stop()));
  });

  describe('forwarding', () => {
    it('relays a message from link A to link B verbatim, exactly once', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      radioA.receive(hello);
      await engine.flush();

      expect(radioB.sent).toEqual([{ id: 'm1', from: '!A1', to: '^all', text: 'hi', channel: 0 }]);
      expect(radioA.sent).toEqual([]);

      radioA.receive(hello);
      await engine.flush();

      expect(radioB.sent).toHaveLength(1);
      const stats = engine.getStats();
      expect(stats.duplicatesSuppressed).toBe(1);
      expect(stats.linkA).toEqual({ received: 1, sent: 0, errors: 0 });
      expect(stats.linkB).toEqual({ received: 0, sent: 1, errors: 0 });
      expect(stats.tracker).toEqual({ totalSeen: 1, totalForwarded: 1, currentlyTracked: 1 });
    });

    it('relays from link B to link A', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      radioB.receive({ id: 99, from: '!B7', to: '!A1', text: 'reply', channel: 1 });
      await engine.flush();

      expect(radioA.sent).toEqual([{ id: '99', from: '!B7', to: '!A1', text: 'reply', channel: 1 }]);
      expect(radioB.sent).toEqual([]);
    });

    it('forwards one of many deliveries of the same id', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      for (let i = 0; i < 10; i++) radioA.receive(hello);
      await engine.flush();

      expect(radioB.sent).toHaveLength(1);
      expect(engine.getStats().duplicatesSuppressed).toBe(9);
    });

    it('does not echo a forwarded message back when the other mesh rebroadcasts it', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      radioA.receive(hello);
      await engine.flush();
      radioB.receive(hello);
      await engine.flush();

      expect(radioB.sent).toHaveLength(1);
      expect(radioA.sent).toHaveLength(0);
      expect(engine.getStats().linkB.received).toBe(0);
    });

    it('forwards again once the dedup window has passed', async () => {
      const { engine, radioA, radioB, advance } = createHarness({
        config: { tracker: { maxAgeMs: 60_000 } },
      });
      await engine.start();

      radioA.receive(hello);
      await engine.flush();
      advance(60_001);
      radioA.receive(hello);
      await engine.flush();

      expect(radioB.sent).toHaveLength(2);
    });

    it('preserves arrival order per link', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      for (const id of ['1', '2', '3']) {
        radioA.receive({ id, from: '!A1', to: '^all', text: `msg ${id}` });
      }
      await engine.flush();

      expect(radioB.sent.map((m) => m.id)).toEqual(['1', '2', '3']);
    });

    it('counts malformed packets as errors on the receiving link', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      radioA.receive({ from: '!A1', text: 'no id' });
      await engine.flush();

      expect(radioB.sent).toEqual([]);
      expect(engine.getStats().linkA.errors).toBe(1);
      expect(engine.isRunning).toBe(true);
    });

    it('ignores packets that are not text messages', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();

      radioA.receive({ id: 5, from: '!A1', to: '^all', text: '', portnum: 'TELEMETRY_APP' });
      await engine.flush();

      expect(radioB.sent).toEqual([]);
      expect(engine.getStats()).toMatchObject({
        linkA: { received: 0, errors: 0 },
        tracker: { totalSeen: 0 },
      });
    });

    it('counts a failed forward against the target link without retrying', async () => {
      const { engine, radioA, radioB } = createHarness();
      await engine.start();
      radioB.sendFailure = 'radio busy';

      radioA.receive(hello);
      await engine.flush();

      expect(engine.getStats().linkB).toEqual({ received: 0, sent: 0, errors: 1 });
      expect(engine.getStats().tracker.totalForwarded).toBe(0);

      radioB.sendFailure = undefined;
      radioA.receive(hello);
      await engine.flush();
      expect(radioB.sent).toEqual([]);
    });

    it('times out a send that never completes and keeps the queue moving', async () => {
      const { engine, radioA, radioB } = createHarness({ config: { sendTimeoutMs: 20 } });
      await engine.start();
      radioB.hangNextSends = 1;

      radioA.receive(hello);
      radioA.receive({ id: 'm2', from: '!A1', to: '^all', text: 'second' });
      await engine.flush();

      expect(engine.getStats().linkB).toEqual({ received: 0, sent: 1, errors: 1 });

      await engine.getConnectionManager('linkB').reconnect();
      radioA.receive({ id: 'm3', from: '!A1', to: '^all', text: 'third' });
      await engine.flush();

      expect(radioB.sent.map((m) => m.id)).toEqual(['m2', 'm3']);
      expect(engine.getStats().linkB).toEqual({ received: 0, sent: 2, errors: 1 });
      expect(engine.getStats().tracker.totalForwarded).toBe(2);
    });

    it('keeps relaying in the other direction while one link is down', async () => {
      const { engine, radioA, radioB } = createHarness({
        config: { connection: { reconnectOnDisconnect: false } },
      });
      await engine.start();

      radioA.drop('usb unplugged');
      expect(engine.getLinkStates().linkA.status).toBe('disconnected');

      radioB.receive({ id: 'b1', from: '!B2', to: '^all', text: 'anyone?' });
      radioB.receive({ id: 'b2', from: '!B2', to: '^all', text: 'hello?' });
      await engine.flush();

      const stats = engine.getStats();
      expect(stats.linkB.received).toBe(2);
      expect(stats.linkA.errors).toBe(2);
      expect(engine.isRunning).toBe(true);
      expect(engine.getStatusSnapshot().links_connected).toBe(false);
    });
  });

  describe('lifecycle', () => {
    it('connects both links and writes an initial status snapshot', async () => {
      const { engine, radioA, radioB, sink } = createHarness();
      await engine.start();

      expect(radioA.isOpen).toBe(true);
      expect(radioB.isOpen).toBe(true);
      expect(engine.state).toBe('running');
      expect(sink.snapshots).toHaveLength(1);
      expect(sink.last?.running).toBe(true);
      expect(sink.last?.links_connected).toBe(true);
    });

    it('closes link A and rethrows when link B cannot be opened', async () => {
      const { engine, radioA, radioB } = createHarness({ config: { connection: { maxRetries: 2 } } });
      radioB.failNextOpens = 2;

      await expect(engine.start()).rejects.toBeInstanceOf(ConnectionError);
      expect(radioA.isOpen).toBe(false);
      expect(radioB.openAttempts).toBe(2);
    });

    it('propagates a fatal startup failure out of run()', async () => {
      const { engine, radioA } = createHarness({ config: { connection: { maxRetries: 1 } } });
      radioA.failNextOpens = 1;

      await expect(engine.run()).rejects.toThrow(/Failed to open \/dev\/ttyUSB0 after 1 attempts/);
      expect(engine.state).toBe('stopped');
    });

    it('runs until shutdown is requested, then closes both links', async () => {
      const { engine, radioA, radioB, sink } = createHarness();
      const running = engine.run();
      await vi.waitFor(() => expect(engine.isRunning).toBe(true));

      engine.requestShutdown();
      engine.requestShutdown();
      await running;

      expect(engine.state).toBe('stopped');
      expect(radioA.isOpen).toBe(false);
      expect(radioB.isOpen).toBe(false);
      expect(radioA.closeCount).toBe(1);
      expect(sink.last?.running).toBe(false);
      expect(sink.last?.links_connected).toBe(false);
    });

    it('abandons a startup backoff when shutdown is requested', async () => {
      const delays: number[] = [];
      const abortableSleep: SleepFn = (ms, signal) =>
        new Promise((_, reject) => {
          delays.push(ms);
          if (signal?.aborted) {
            reject(new AbortedError());
            return;
          }
          signal?.addEventListener('abort', () => reject(new AbortedError()), { once: true });
        });
      const { engine, radioA } = createHarness({ sleep: abortableSleep });
      radioA.failNextOpens = 5;

      const running = engine.run();
      await vi.waitFor(() => expect(delays).toEqual([2000]));
      engine.requestShutdown();

      await expect(running).resolves.toBeUndefined();
      expect(radioA.openAttempts).toBe(1);
      expect(engine.state).toBe('stopped');
    });

    it('refuses to start twice', async () => {
      const { engine } = createHarness();
      await engine.start();
      await expect(engine.start()).rejects.toThrow('Cannot start bridge in state running');
    });
  });

  describe('status snapshot', () => {
    it('reflects counters, uptime, ports and health failures', async () => {
      const { engine, radioA, advance } = createHarness();
      await engine.start();

      radioA.receive(hello);
      radioA.receive(hello);
      await engine.flush();
      engine.getConnectionManager('linkB').recordHealthFailure();
      advance(90_500);

      expect(engine.getStatusSnapshot()).toEqual({
        running: true,
        links_connected: true,
        uptime_seconds: 90,
        stats: {
          linkA: { received: 1, sent: 0, errors: 0 },
          linkB: { received: 0, sent: 1, errors: 0 },
          duplicates_suppressed: 1,
          tracker: { total_seen: 1, total_forwarded: 1, currently_tracked: 1 },
        },
        health_failures: { linkA: 0, linkB: 1 },
        timestamp: 1_700_000_090,
        ports: { linkA: PORT_A, linkB: PORT_B },
        links: { linkA: { status: 'connected' }, linkB: { status: 'connected' } },
      });
    });

    it('returns stats as a copy', async () => {
      const { engine } = createHarness();
      await engine.start();

      const stats = engine.getStats();
      stats.linkA.received = 100;

      expect(engine.getStats().linkA.received).toBe(0);
    });
  });

  describe('sendText', () => {
    it('sends an operator message and counts it', async () => {
      const { engine, radioA } = createHarness();
      await engine.start();

      expect(await engine.sendText('linkA', 'bridge online', 2)).toBe(true);
      expect(radioA.sent).toHaveLength(1);
      expect(radioA.sent[0]).toMatchObject({ from: 'local', to: '^all', text: 'bridge online', channel: 2 });
      expect(engine.getStats().linkA.sent).toBe(1);
    });

    it('reports failure without throwing', async () => {
      const { engine, radioB } = createHarness();
      await engine.start();
      radioB.sendFailure = 'tx queue full';

      expect(await engine.sendText('linkB', 'ping')).toBe(false);
      expect(engine.getStats().linkB.errors).toBe(1);
    });
  });

  describe('node info', () => {
    const heltec: NodeInfo = {
      nodeId: '!a1b2c3d4',
      hwModel: 'HELTEC_V3',
      firmwareVersion: '2.5.6',
      channels: [
        { index: 0, name: 'LongFast', role: 'SECONDARY' },
        { index: 1, name: 'admin', role: 'SECONDARY' },
      ],
    };

    it('reports the radio behind each link', async () => {
      const { engine, radioA } = createHarness();
      radioA.nodeInfo = heltec;
      await engine.start();

      expect(await engine.getNodeInfo('linkA')).toEqual(heltec);
      await expect(engine.getNodeInfo('linkB')).rejects.toThrow(
        'Radio on /dev/ttyUSB1 does not report node info'
      );

      await engine.stop();
      expect(await engine.getNodeInfo('linkA')).toBeUndefined();
    });

    it('logs identity and channel advice when a link connects', async () => {
      const logger = createLogger('engine-test');
      const info = vi.spyOn(logger, 'info');
      const warn = vi.spyOn(logger, 'warn');
      const { engine, radioB } = createHarness({ logger });
      radioB.nodeInfo = heltec;

      await engine.start();

      expect(info).toHaveBeenCalledWith('Radio identified', {
        link: 'linkB',
        nodeId: '!a1b2c3d4',
        hwModel: 'HELTEC_V3',
        firmware: '2.5.6',
      });
      expect(info.mock.calls.filter((call) => call[0] === 'Radio identified')).toHaveLength(1);
      expect(warn).toHaveBeenCalledWith('Radio configuration', {
        link: 'linkB',
        recommendation: 'Channel 0 should be set to PRIMARY role',
      });
      expect(engine.isRunning).toBe(true);

      await engine.getConnectionManager('linkB').reconnect();
      await vi.waitFor(() =>
        expect(info.mock.calls.filter((call) => call[0] === 'Radio identified')).toHaveLength(2)
      );
    });

    it('only advises on channel 0', () => {
      expect(nodeInfoRecommendations(heltec)).toEqual(['Channel 0 should be set to PRIMARY role']);
      expect(
        nodeInfoRecommendations({
          nodeId: '!00000001',
          channels: [
            { index: 0, name: 'LongFast', role: 'PRIMARY' },
            { index: 1, name: 'admin', role: 'DISABLED' },
          ],
        })
      ).toEqual([]);
      expect(nodeInfoRecommendations({ nodeId: '!00000001' })).toEqual([]);
    });
  });

  it('lists recently tracked messages', async () => {
    const { engine, radioA } = createHarness();
    await engine.start();

    radioA.receive(hello);
    await engine.flush();

    expect(engine.getRecentMessages()).toEqual([
      { id: 'm1', origin: 'linkA', summary: 'hi', timestamp: 1_700_000_000_000, forwarded: true },
    ]);
  });
});
