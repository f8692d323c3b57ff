/**
 * Error Types for the mesh bridge
 *
 * Every failure the bridge distinguishes has its own class and a stable
 * `code`, so callers can branch on kind without string matching.
 */

import type { LinkId } from './types.js';

export type BridgeErrorCode =
  | 'CONNECTION_FAILED'
  | 'SEND_FAILED'
  | 'COMMAND_FAILED'
  | 'UNSUPPORTED'
  | 'PROTOCOL_ERROR'
  | 'CONFIG_INVALID';

export interface BridgeErrorOptions {
  link?: LinkId;
  cause?: unknown;
}

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly link?: LinkId;

  constructor(message: string, code: BridgeErrorCode, options: BridgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BridgeError';
    this.code = code;
    this.link = options.link;
  }
}

/** The link could not be opened. */
export class ConnectionError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, 'CONNECTION_FAILED', options);
    this.name = 'ConnectionError';
  }
}

/** Transient, non-fatal send failure. */
export class SendError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, 'SEND_FAILED', options);
    this.name = 'SendError';
  }
}

/** A radio command (reboot) was accepted by the driver but failed. */
export class CommandError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, 'COMMAND_FAILED', options);
    this.name = 'CommandError';
  }
}

/** The radio or its driver does not support the requested command. */
export class UnsupportedError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, 'UNSUPPORTED', options);
    this.name = 'UnsupportedError';
  }
}

/** Malformed inbound packet. Dropped and counted, never propagated. */
export class ProtocolError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, 'PROTOCOL_ERROR', options);
    this.name = 'ProtocolError';
  }
}

export class ConfigError extends BridgeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
