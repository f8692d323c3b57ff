/**
 * Serial device discovery.
 *
 * USB radios show up as /dev/ttyUSB* (CP210x, CH340) or /dev/ttyACM*
 * (native USB). A candidate only counts as a radio once the driver has
 * opened it and it answered a probe.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { toErrorMessage } from './errors.js';
import type { RadioConnection, RadioDriver } from './types.js';
import { createLogger } from '../resiliency/logger.js';
import { sleep as defaultSleep, withTimeout, type SleepFn } from '../utils/sleep.js';

const logger = createLogger('discovery');

export const SERIAL_DEVICE_DIR = '/dev';
export const SERIAL_DEVICE_PATTERN = /^tty(USB|ACM)\d+$/;

export interface DiscoveryDeps {
  driver?: RadioDriver;
  readDir?: (dir: string) => Promise<string[]>;
  sleep?: SleepFn;
  now?: () => number;
  signal?: AbortSignal;
}

async function readDevDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (err) {
    logger.debug('Cannot list device directory', { dir, error: toErrorMessage(err) });
    return [];
  }
}

/**
 * Serial devices that might be radios, sorted, plus whatever the driver
 * itself reports.
 */
export async function listCandidatePorts(deps: DiscoveryDeps = {}): Promise<string[]> {
  const readDir = deps.readDir ?? readDevDir;
  const entries = await readDir(SERIAL_DEVICE_DIR);
  const ports = new Set(
    entries.filter((name) => SERIAL_DEVICE_PATTERN.test(name)).map((name) => path.posix.join(SERIAL_DEVICE_DIR, name))
  );

  if (deps.driver?.listPorts) {
    try {
      for (const port of await deps.driver.listPorts()) ports.add(port);
    } catch (err) {
      logger.warn('Driver port listing failed', { driver: deps.driver.name, error: toErrorMessage(err) });
    }
  }

  return [...ports].sort();
}

export interface DetectOptions {
  required?: number;
  probeTimeoutMs?: number;
}

/**
 * Open each candidate in turn and keep the ones that answer a probe, up to
 * `required`. Every connection opened here is closed again.
 */
export async function detectRadioPorts(
  driver: RadioDriver,
  candidates: string[],
  options: DetectOptions = {}
): Promise<string[]> {
  const required = options.required ?? 2;
  const probeTimeoutMs = options.probeTimeoutMs ?? 10_000;
  const verified: string[] = [];

  for (const port of candidates) {
    if (verified.length >= required) break;

    let connection: RadioConnection;
    try {
      connection = await driver.open(port);
    } catch (err) {
      logger.debug('Not a radio', { port, error: toErrorMessage(err) });
      continue;
    }

    try {
      const responsive = await withTimeout(
        connection.isResponsive(),
        probeTimeoutMs,
        `Probe of ${port} timed out after ${probeTimeoutMs}ms`
      );
      if (responsive) {
        verified.push(port);
        logger.info('Found radio', { port });
      } else {
        logger.debug('Radio did not answer probe', { port });
      }
    } catch (err) {
      logger.debug('Probe failed', { port, error: toErrorMessage(err) });
    } finally {
      try {
        await connection.close();
      } catch (err) {
        logger.warn('Error closing probed port', { port, error: toErrorMessage(err) });
      }
    }
  }

  return verified;
}

/**
 * Poll for candidate ports until at least `required` exist or `maxWaitMs`
 * has passed. Returns whatever was found last.
 */
export async function waitForPorts(
  required: number,
  maxWaitMs: number,
  intervalMs: number,
  deps: DiscoveryDeps = {}
): Promise<string[]> {
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => Date.now());
  const deadline = now() + maxWaitMs;

  let ports = await listCandidatePorts(deps);
  while (ports.length < required && now() < deadline) {
    logger.info('Waiting for radios', { found: ports.length, required });
    await sleep(Math.min(intervalMs, Math.max(0, deadline - now())), deps.signal);
    ports = await listCandidatePorts(deps);
  }
  return ports;
}
