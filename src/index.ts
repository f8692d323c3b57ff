/**
 * Mesh Bridge
 * Relays text messages between two mesh radio networks.
 */

export * from './bridge/types.js';
export * from './bridge/errors.js';
export * from './bridge/message-tracker.js';
export * from './bridge/packet.js';
export * from './bridge/link.js';
export * from './bridge/connection-manager.js';
export * from './bridge/engine.js';
export * from './bridge/status.js';
export * from './bridge/device-discovery.js';
export * from './resiliency/index.js';
export {
  bridgeConfigSchema,
  loadConfig,
  type BridgeConfig,
  type BridgeConfigInput,
  type LoadConfigOptions,
} from './config/bridge-config.js';
export { LoopbackRadio, LoopbackRadioDriver, type RebootBehavior } from './drivers/loopback.js';
export { loadRadioDriver } from './cli/lib/driver-loader.js';
export { AbortedError, sleep, withTimeout, type SleepFn } from './utils/sleep.js';
