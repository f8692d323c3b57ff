import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigError, toErrorMessage } from '../../bridge/errors.js';
import type { RadioDriver } from '../../bridge/types.js';
import { createRadioDriver as createLoopbackDriver } from '../../drivers/loopback.js';

export const LOOPBACK_DRIVER = 'loopback';

export interface DriverLoaderOptions {
  cwd?: string;
  importModule?: (specifier: string) => Promise<unknown>;
}

function isRadioDriver(value: unknown): value is RadioDriver {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'open' in value &&
    typeof value.open === 'function'
  );
}

function findFactory(mod: unknown): (() => unknown) | undefined {
  if (typeof mod !== 'object' || mod === null) return undefined;
  if ('createRadioDriver' in mod && typeof mod.createRadioDriver === 'function') {
    const factory = mod.createRadioDriver;
    return () => factory();
  }
  if ('default' in mod && typeof mod.default === 'function') {
    const factory = mod.default;
    return () => factory();
  }
  return undefined;
}

/**
 * Relative and absolute paths load from disk; anything else is a package
 * name resolved by Node.
 */
export function resolveDriverSpecifier(specifier: string, cwd: string): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

/**
 * Load the radio driver named by `specifier`. Driver modules export
 * `createRadioDriver()` or a default export of the same shape.
 */
export async function loadRadioDriver(
  specifier: string,
  options: DriverLoaderOptions = {}
): Promise<RadioDriver> {
  if (specifier === LOOPBACK_DRIVER) {
    return createLoopbackDriver();
  }

  const cwd = options.cwd ?? process.cwd();
  const importModule = options.importModule ?? ((target: string): Promise<unknown> => import(target));
  const target = resolveDriverSpecifier(specifier, cwd);

  let mod: unknown;
  try {
    mod = await importModule(target);
  } catch (err) {
    throw new ConfigError(`Cannot load radio driver "${specifier}": ${toErrorMessage(err)}`);
  }

  const factory = findFactory(mod);
  if (!factory) {
    throw new ConfigError(
      `Radio driver "${specifier}" must export createRadioDriver() or a default factory function`
    );
  }

  const driver = await factory();
  if (!isRadioDriver(driver)) {
    throw new ConfigError(`Radio driver "${specifier}" did not return a driver with name and open()`);
  }
  return driver;
}
