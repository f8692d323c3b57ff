import fs from 'node:fs';
import { Command } from 'commander';

import { toErrorMessage } from '../../bridge/errors.js';
import {
  DEFAULT_STATUS_FILE,
  DEFAULT_STATUS_MAX_AGE_SECONDS,
  HEALTH_EXIT_CODES,
  evaluateStatus,
  statusSnapshotSchema,
  type StatusEvaluation,
} from '../../bridge/status.js';

type ExitFn = (code: number) => never;

export interface HealthDependencies {
  pathExists: (target: string) => boolean;
  readFile: (target: string) => string;
  nowMs: () => number;
  env: NodeJS.ProcessEnv;
  log: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<HealthDependencies> = {}): HealthDependencies {
  return {
    pathExists: (target: string) => fs.existsSync(target),
    readFile: (target: string) => fs.readFileSync(target, 'utf-8'),
    nowMs: () => Date.now(),
    env: process.env,
    log: (...args: unknown[]) => console.log(...args),
    exit: defaultExit,
    ...overrides,
  };
}

/**
 * Evaluate a status file the way a Nagios-style check expects:
 * exit 0 = OK, 1 = WARNING, 2 = CRITICAL.
 */
export function checkStatusFile(
  statusFile: string,
  maxAgeSeconds: number,
  deps: Pick<HealthDependencies, 'pathExists' | 'readFile' | 'nowMs'>
): StatusEvaluation {
  if (!deps.pathExists(statusFile)) {
    return {
      level: 'CRITICAL',
      message: `Status file ${statusFile} not found - bridge may not be running`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(deps.readFile(statusFile));
  } catch (err) {
    return { level: 'CRITICAL', message: `Status file ${statusFile} is unreadable: ${toErrorMessage(err)}` };
  }

  const parsed = statusSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { level: 'CRITICAL', message: `Status file ${statusFile} has an unexpected format` };
  }

  return evaluateStatus(parsed.data, deps.nowMs() / 1000, maxAgeSeconds);
}

export function registerHealthCommands(program: Command, overrides: Partial<HealthDependencies> = {}): void {
  const deps = withDefaults(overrides);

  program
    .command('health')
    .description('Check a running bridge through its status file (exit 0=OK, 1=WARNING, 2=CRITICAL)')
    .option('--status-file <path>', 'Status file written by the bridge')
    .option('--max-age <seconds>', 'Oldest acceptable status file', String(DEFAULT_STATUS_MAX_AGE_SECONDS))
    .action((options: { statusFile?: string; maxAge?: string }) => {
      const statusFile = options.statusFile || deps.env.MESH_BRIDGE_STATUS_FILE || DEFAULT_STATUS_FILE;
      const maxAge = Number(options.maxAge ?? DEFAULT_STATUS_MAX_AGE_SECONDS);
      if (!Number.isFinite(maxAge) || maxAge <= 0) {
        deps.log(`CRITICAL: Invalid --max-age value "${options.maxAge}"`);
        return deps.exit(HEALTH_EXIT_CODES.CRITICAL);
      }

      const result = checkStatusFile(statusFile, maxAge, deps);
      deps.log(`${result.level}: ${result.message}`);
      return deps.exit(HEALTH_EXIT_CODES[result.level]);
    });
}
