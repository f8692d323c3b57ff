import { Command } from 'commander';

import { BridgeEngine, type BridgeEngineConfig, type BridgeEngineDeps } from '../../bridge/engine.js';
import { toErrorMessage } from '../../bridge/errors.js';
import { detectRadioPorts, waitForPorts } from '../../bridge/device-discovery.js';
import { FileStatusSink, LogStatusSink, type StatusSink } from '../../bridge/status.js';
import type { LinkId, RadioDriver } from '../../bridge/types.js';
import { loadConfig, type BridgeConfig, type LoadConfigOptions } from '../../config/bridge-config.js';
import { configure, isLogLevel, type LoggerConfig } from '../../resiliency/logger.js';
import { loadRadioDriver } from '../lib/driver-loader.js';

type ExitFn = (code: number) => never;

export interface BridgeRunner {
  run(): Promise<void>;
  requestShutdown(): void;
}

export interface RunDependencies {
  loadConfig: (options: LoadConfigOptions) => BridgeConfig;
  loadDriver: (specifier: string) => Promise<RadioDriver>;
  waitForPorts: (required: number, maxWaitMs: number, intervalMs: number, driver: RadioDriver) => Promise<string[]>;
  detectRadioPorts: (driver: RadioDriver, candidates: string[], required: number, probeTimeoutMs: number) => Promise<string[]>;
  createEngine: (config: BridgeEngineConfig, deps: BridgeEngineDeps) => BridgeRunner;
  configureLogging: (config: Partial<LoggerConfig>) => void;
  onSignal: (signal: NodeJS.Signals, listener: () => void) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<RunDependencies> = {}): RunDependencies {
  return {
    loadConfig,
    loadDriver: (specifier: string) => loadRadioDriver(specifier),
    waitForPorts: (required, maxWaitMs, intervalMs, driver) =>
      waitForPorts(required, maxWaitMs, intervalMs, { driver }),
    detectRadioPorts: (driver, candidates, required, probeTimeoutMs) =>
      detectRadioPorts(driver, candidates, { required, probeTimeoutMs }),
    createEngine: (config, deps) => new BridgeEngine(config, deps),
    configureLogging: configure,
    onSignal: (signal, listener) => {
      process.on(signal, listener);
    },
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

interface RunOptions {
  config?: string;
  driver?: string;
  statusFile?: string;
  logLevel?: string;
  waitForDevices?: string;
}

export function engineConfigFrom(config: BridgeConfig, ports: Record<LinkId, string>): BridgeEngineConfig {
  return {
    ports,
    tracker: config.tracker,
    connection: {
      maxRetries: config.connection.maxRetries,
      initialDelayMs: config.connection.initialDelayMs,
      reconnectOnDisconnect: config.connection.reconnectOnDisconnect,
    },
    health: {
      checkIntervalMs: config.health.checkIntervalMs,
      failureThreshold: config.health.failureThreshold,
      rebootSettleMs: config.health.rebootSettleMs,
    },
    statusIntervalMs: config.status.intervalMs,
    probeTimeoutMs: config.health.probeTimeoutMs,
    sendTimeoutMs: config.connection.sendTimeoutMs,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
  };
}

export function registerRunCommands(program: Command, overrides: Partial<RunDependencies> = {}): void {
  const deps = withDefaults(overrides);

  const fail = (message: string): never => {
    deps.error(message);
    return deps.exit(1);
  };

  program
    .command('run')
    .description('Bridge text messages between two radios')
    .argument('[portA]', 'Serial port of the first radio (auto-detected when omitted)')
    .argument('[portB]', 'Serial port of the second radio (auto-detected when omitted)')
    .option('-c, --config <path>', 'YAML config file')
    .option('--driver <module>', 'Radio driver module, or "loopback"')
    .option('--status-file <path>', 'Where to write the status snapshot')
    .option('--log-level <level>', 'debug, info, warn, error or fatal')
    .option('--wait-for-devices <seconds>', 'Wait up to this long for radios to be plugged in')
    .action(async (portA: string | undefined, portB: string | undefined, options: RunOptions) => {
      if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
        return fail(`Invalid log level "${options.logLevel}"`);
      }
      const logLevel = options.logLevel !== undefined && isLogLevel(options.logLevel) ? options.logLevel : undefined;

      let waitForDevicesMs: number | undefined;
      if (options.waitForDevices !== undefined) {
        const seconds = Number(options.waitForDevices);
        if (!Number.isFinite(seconds) || seconds < 0) {
          return fail(`Invalid --wait-for-devices value "${options.waitForDevices}"`);
        }
        waitForDevicesMs = Math.round(seconds * 1000);
      }

      let config: BridgeConfig;
      try {
        config = deps.loadConfig({
          configPath: options.config,
          overrides: {
            ports: { linkA: portA, linkB: portB },
            driver: options.driver,
            status: { file: options.statusFile },
            logging: { level: logLevel },
            discovery: { waitForDevicesMs },
          },
        });
      } catch (err) {
        return fail(toErrorMessage(err));
      }

      deps.configureLogging({ level: config.logging.level, file: config.logging.file });

      if (!config.driver) {
        return fail('No radio driver configured. Pass --driver or set MESH_BRIDGE_DRIVER.');
      }

      let driver: RadioDriver;
      try {
        driver = await deps.loadDriver(config.driver);
      } catch (err) {
        return fail(toErrorMessage(err));
      }

      let ports: Record<LinkId, string>;
      const { linkA, linkB } = config.ports;
      if (linkA && linkB) {
        deps.log(`Using specified ports: ${linkA} and ${linkB}`);
        ports = { linkA, linkB };
      } else {
        deps.log('Auto-detecting radios...');
        const needed = linkA || linkB ? 1 : 2;
        const candidates = await deps.waitForPorts(
          2,
          config.discovery.waitForDevicesMs,
          config.discovery.pollIntervalMs,
          driver
        );
        const found = await deps.detectRadioPorts(
          driver,
          candidates.filter((port) => port !== linkA && port !== linkB),
          needed,
          config.health.probeTimeoutMs
        );
        if (found.length < needed) {
          return fail(
            `Found ${found.length} radio(s), need ${needed}. Connect both radios via USB or pass the ports explicitly.`
          );
        }
        const [first, second] = found;
        ports = linkA
          ? { linkA, linkB: first }
          : linkB
            ? { linkA: first, linkB }
            : { linkA: first, linkB: second };
        deps.log(`Detected ports: ${ports.linkA} and ${ports.linkB}`);
      }

      const sinks: StatusSink[] = [new FileStatusSink(config.status.file)];
      if (config.status.log) {
        sinks.push(new LogStatusSink());
      }

      const engine = deps.createEngine(engineConfigFrom(config, ports), { driver, statusSinks: sinks });
      deps.onSignal('SIGINT', () => engine.requestShutdown());
      deps.onSignal('SIGTERM', () => engine.requestShutdown());

      deps.log('Starting bridge. Press Ctrl+C to stop.');
      try {
        await engine.run();
      } catch (err) {
        return fail(`Fatal error: ${toErrorMessage(err)}`);
      }
      deps.log('Bridge stopped.');
    });
}
