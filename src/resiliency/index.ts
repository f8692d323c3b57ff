/**
 * Link Resiliency Module
 *
 * Health probing with reboot and reconnect escalation, plus the structured
 * logger shared by the rest of the bridge.
 *
 * Usage:
 *
 * ```ts
 * import { LinkHealthMonitor, createLogger } from './resiliency/index.js';
 *
 * const monitor = new LinkHealthMonitor({ failureThreshold: 3 });
 * monitor.register(connectionManager);
 * monitor.on('recoveryFailed', ({ link, error }) => log.error('Recovery failed', { link, error }));
 * monitor.start();
 * ```
 */

export {
  LinkHealthMonitor,
  DEFAULT_HEALTH_CONFIG,
  type HealthCheckOutcome,
  type HealthMonitorConfig,
  type HealthMonitorDeps,
  type HealthTarget,
} from './health-monitor.js';

export {
  Logger,
  createLogger,
  configure as configureLogging,
  isLogLevel,
  loggers,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
} from './logger.js';
