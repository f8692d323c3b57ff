import { describe, expect, it, vi } from 'vitest';

import { loadRadioDriver, resolveDriverSpecifier } from './driver-loader.js';
import { ConfigError } from '../../bridge/errors.js';
import { LoopbackRadioDriver } from '../../drivers/loopback.js';

describe('loadRadioDriver', () => {
  it('builds the loopback driver without importing anything', async () => {
    const importModule = vi.fn(async () => ({}));

    const driver = await loadRadioDriver('loopback', { importModule });

    expect(driver).toBeInstanceOf(LoopbackRadioDriver);
    expect(await driver.listPorts?.()).toEqual(['loopback://a', 'loopback://b']);
    expect(importModule).not.toHaveBeenCalled();
  });

  it('uses a createRadioDriver export', async () => {
    const custom = new LoopbackRadioDriver(['/dev/ttyUSB0']);
    const importModule = vi.fn(async () => ({ createRadioDriver: () => custom }));

    const driver = await loadRadioDriver('./drivers/serial.js', { cwd: '/srv/bridge', importModule });

    expect(driver).toBe(custom);
    expect(importModule).toHaveBeenCalledWith('file:///srv/bridge/drivers/serial.js');
  });

  it('falls back to an async default export', async () => {
    const custom = new LoopbackRadioDriver();
    const importModule = vi.fn(async () => ({ default: async () => custom }));

    expect(await loadRadioDriver('mesh-serial-driver', { importModule })).toBe(custom);
    expect(importModule).toHaveBeenCalledWith('mesh-serial-driver');
  });

  it('rejects a module without a factory', async () => {
    const importModule = vi.fn(async () => ({ version: 2 }));

    await expect(loadRadioDriver('mesh-serial-driver', { importModule })).rejects.toThrow(
      'Radio driver "mesh-serial-driver" must export createRadioDriver() or a default factory function'
    );
  });

  it('rejects a factory that returns something else', async () => {
    const importModule = vi.fn(async () => ({ createRadioDriver: () => ({ name: 'half' }) }));

    await expect(loadRadioDriver('mesh-serial-driver', { importModule })).rejects.toBeInstanceOf(ConfigError);
  });

  it('wraps import failures', async () => {
    const importModule = vi.fn(async () => {
      throw new Error('Cannot find module');
    });

    await expect(loadRadioDriver('missing-driver', { importModule })).rejects.toThrow(
      'Cannot load radio driver "missing-driver": Cannot find module'
    );
  });
});

describe('resolveDriverSpecifier', () => {
  it('turns paths into file URLs and leaves package names alone', () => {
    expect(resolveDriverSpecifier('/opt/driver.js', '/srv')).toBe('file:///opt/driver.js');
    expect(resolveDriverSpecifier('../driver.js', '/srv/bridge')).toBe('file:///srv/driver.js');
    expect(resolveDriverSpecifier('@mesh/serial', '/srv')).toBe('@mesh/serial');
  });
});
