/**
 * Error taxonomy shared by the writer, the store and the display
 */

import { PRESENCE_STATES } from './types/index.js';

export type PresenceErrorCode =
  | 'INVALID_STATE'
  | 'CORRUPT_STATE'
  | 'STORE_UNAVAILABLE'
  | 'INVALID_CONFIG';

export class PresenceError extends Error {
  constructor(
    readonly code: PresenceErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidStateError extends PresenceError {
  constructor(readonly stateName: string) {
    super('INVALID_STATE', `Invalid state '${stateName}'. Valid states: ${[...PRESENCE_STATES].sort().join(', ')}`);
  }
}

export class CorruptStateError extends PresenceError {
  constructor(path: string, options?: { cause?: unknown }) {
    super('CORRUPT_STATE', `State file is unreadable or malformed: ${path}`, options);
  }
}

export class StoreUnavailableError extends PresenceError {
  constructor(path: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', `State store is not accessible: ${path}`, options);
  }
}

export class InvalidConfigError extends PresenceError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/**
 * Node reports a missing file with code ENOENT
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
