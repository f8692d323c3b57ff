import { Command } from 'commander';

import { detectRadioPorts, listCandidatePorts } from '../../bridge/device-discovery.js';
import { toErrorMessage } from '../../bridge/errors.js';
import type { RadioDriver } from '../../bridge/types.js';
import { loadRadioDriver } from '../lib/driver-loader.js';

type ExitFn = (code: number) => never;

export interface DevicesDependencies {
  loadDriver: (specifier: string) => Promise<RadioDriver>;
  listCandidatePorts: (driver?: RadioDriver) => Promise<string[]>;
  detectRadioPorts: (driver: RadioDriver, candidates: string[]) => Promise<string[]>;
  env: NodeJS.ProcessEnv;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<DevicesDependencies> = {}): DevicesDependencies {
  return {
    loadDriver: (specifier: string) => loadRadioDriver(specifier),
    listCandidatePorts: (driver?: RadioDriver) => listCandidatePorts({ driver }),
    detectRadioPorts: (driver, candidates) =>
      detectRadioPorts(driver, candidates, { required: candidates.length }),
    env: process.env,
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

export function registerDevicesCommands(program: Command, overrides: Partial<DevicesDependencies> = {}): void {
  const deps = withDefaults(overrides);

  program
    .command('devices')
    .description('List serial ports that may have a radio attached')
    .option('--driver <module>', 'Radio driver module, or "loopback"')
    .option('--verify', 'Open each port and probe it through the driver')
    .option('--json', 'Output as JSON')
    .action(async (options: { driver?: string; verify?: boolean; json?: boolean }) => {
      const specifier = options.driver || deps.env.MESH_BRIDGE_DRIVER;
      if (options.verify && !specifier) {
        deps.error('--verify needs a radio driver. Pass --driver or set MESH_BRIDGE_DRIVER.');
        return deps.exit(1);
      }

      let driver: RadioDriver | undefined;
      if (specifier) {
        try {
          driver = await deps.loadDriver(specifier);
        } catch (err) {
          deps.error(toErrorMessage(err));
          return deps.exit(1);
        }
      }

      const ports = await deps.listCandidatePorts(driver);
      const verified = options.verify && driver ? new Set(await deps.detectRadioPorts(driver, ports)) : undefined;

      if (options.json) {
        deps.log(
          JSON.stringify(
            ports.map((port) => (verified ? { port, radio: verified.has(port) } : { port })),
            null,
            2
          )
        );
        return;
      }

      if (ports.length === 0) {
        deps.log('No serial devices found.');
        deps.log('Check that the radios are plugged in and the user can read /dev/ttyUSB* and /dev/ttyACM*.');
        return;
      }

      for (const port of ports) {
        if (!verified) {
          deps.log(port);
        } else {
          deps.log(`${port}  ${verified.has(port) ? 'radio' : 'no response'}`);
        }
      }
      deps.log('');
      deps.log(
        verified
          ? `Total: ${ports.length} device(s), ${verified.size} radio(s)`
          : `Total: ${ports.length} device(s)`
      );
    });
}
