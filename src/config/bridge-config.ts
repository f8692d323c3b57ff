/**
 * Bridge configuration.
 *
 * Sources, lowest precedence first:
 *   1. built-in defaults (the schema)
 *   2. YAML file (--config, or ./mesh-bridge.yaml when present)
 *   3. environment (MESH_BRIDGE_*; .env is loaded by the CLI)
 *   4. command-line flags
 */

import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from '../bridge/errors.js';
import { DEFAULT_STATUS_FILE } from '../bridge/status.js';

export const DEFAULT_CONFIG_FILENAME = 'mesh-bridge.yaml';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const bridgeConfigSchema = z.object({
  ports: z
    .object({
      linkA: z.string().min(1).optional(),
      linkB: z.string().min(1).optional(),
    })
    .default({}),
  /** Driver module specifier, or "loopback" */
  driver: z.string().min(1).optional(),
  tracker: z
    .object({
      maxAgeMs: positiveInt.default(10 * 60 * 1000),
      maxMessages: positiveInt.default(1000),
    })
    .default({}),
  connection: z
    .object({
      maxRetries: positiveInt.default(5),
      initialDelayMs: nonNegativeInt.default(2000),
      reconnectOnDisconnect: z.boolean().default(true),
      /** A send the radio has not accepted by then counts as failed */
      sendTimeoutMs: positiveInt.default(10_000),
    })
    .default({}),
  health: z
    .object({
      checkIntervalMs: positiveInt.default(60_000),
      failureThreshold: positiveInt.default(3),
      rebootSettleMs: nonNegativeInt.default(10_000),
      probeTimeoutMs: positiveInt.default(10_000),
    })
    .default({}),
  status: z
    .object({
      file: z.string().min(1).default(DEFAULT_STATUS_FILE),
      intervalMs: positiveInt.default(30_000),
      /** Also log each snapshot */
      log: z.boolean().default(false),
    })
    .default({}),
  discovery: z
    .object({
      /** Wait this long for serial devices to appear before giving up (0 = don't wait) */
      waitForDevicesMs: nonNegativeInt.default(0),
      pollIntervalMs: positiveInt.default(1000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      file: z.string().min(1).optional(),
    })
    .default({}),
  shutdownTimeoutMs: positiveInt.default(5000),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: BridgeConfigInput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  readFile?: (filePath: string) => string;
  exists?: (filePath: string) => boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`. Objects merge recursively; undefined values
 * in the override leave the base untouched.
 */
export function mergeConfig(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfig(current, value) : value;
  }
  return result;
}

/**
 * Config values taken from MESH_BRIDGE_* variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const fromEnv: PlainObject = {
    ports: {
      linkA: env.MESH_BRIDGE_PORT_A || undefined,
      linkB: env.MESH_BRIDGE_PORT_B || undefined,
    },
    driver: env.MESH_BRIDGE_DRIVER || undefined,
    status: {
      file: env.MESH_BRIDGE_STATUS_FILE || undefined,
    },
    logging: {
      level: env.MESH_BRIDGE_LOG_LEVEL || undefined,
      file: env.MESH_BRIDGE_LOG_FILE || undefined,
    },
  };
  return fromEnv;
}

function readConfigFile(filePath: string, readFile: (filePath: string) => string): PlainObject {
  let parsed: unknown;
  try {
    parsed = YAML.parse(readFile(filePath));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${filePath}: ${toErrorMessage(err)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const readFile = options.readFile ?? ((filePath: string) => fs.readFileSync(filePath, 'utf-8'));
  const exists = options.exists ?? ((filePath: string) => fs.existsSync(filePath));

  let fileConfig: PlainObject = {};
  if (options.configPath) {
    const resolved = path.resolve(cwd, options.configPath);
    if (!exists(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    fileConfig = readConfigFile(resolved, readFile);
  } else {
    const candidate = path.join(cwd, DEFAULT_CONFIG_FILENAME);
    if (exists(candidate)) {
      fileConfig = readConfigFile(candidate, readFile);
    }
  }

  const merged = mergeConfig(mergeConfig(fileConfig, configFromEnv(env)), options.overrides ?? {});
  const result = bridgeConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
