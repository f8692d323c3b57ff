#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';

import { registerDevicesCommands } from './commands/devices.js';
import { registerHealthCommands } from './commands/health.js';
import { registerRunCommands } from './commands/run.js';

dotenvConfig({ quiet: true });

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function findPackageJson(startDir: string): string {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }

  throw new Error('Could not find package.json');
}

function resolveCliVersion(): string {
  const envVersion = process.env.MESH_BRIDGE_VERSION;
  if (envVersion) {
    return envVersion;
  }

  try {
    const packageJson: unknown = JSON.parse(fs.readFileSync(findPackageJson(__dirname), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export const VERSION = resolveCliVersion();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mesh-bridge')
    .description('Relay text messages between two mesh radio networks')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerRunCommands(program);
  registerHealthCommands(program);
  registerDevicesCommands(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<Command> {
  const program = createProgram();
  await program.parseAsync(argv);
  return program;
}

function isEntrypoint(): boolean {
  const invocationPath = process.argv[1];
  if (!invocationPath) {
    return false;
  }
  try {
    return fs.realpathSync(invocationPath) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return path.resolve(invocationPath) === fileURLToPath(import.meta.url);
  }
}

if (isEntrypoint()) {
  runCli().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
