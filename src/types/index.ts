/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export const PRESENCE_STATES = ['idle', 'work', 'think', 'alert', 'sleep'] as const;

export type PresenceState = (typeof PRESENCE_STATES)[number];

export function isPresenceState(value: string): value is PresenceState {
  return PRESENCE_STATES.some((state) => state === value);
}

/**
 * The single persisted status slot. Each write replaces the whole record.
 */
export interface StatusRecord {
  state: PresenceState;
  message: string;
  /** Epoch milliseconds, set by the writer */
  updatedAt: number;
}

export type StatusRecordInput = Omit<StatusRecord, 'updatedAt'> & { updatedAt?: number };

export interface PresenceConfig {
  /** Monogram letter, A-Z */
  letter: string;
  /** Label shown at the bottom of the display */
  name: string;
  /**
   * Seconds without an update before the display falls back to idle.
   * 0 disables the decay.
   */
  idleTimeoutSeconds: number;
  /**
   * Daily window [sleepStartHour, sleepEndHour) during which the display
   * always shows sleep. Wraps past midnight when start > end (23 -> 7).
   * Equal hours mean no window.
   */
  sleepStartHour: number;
  sleepEndHour: number;
}

export interface EffectiveState {
  state: PresenceState;
  message: string;
}

export type StateColor = 'cyan' | 'green' | 'yellow' | 'red' | 'blue';

export const STATE_COLORS: Record<PresenceState, StateColor> = {
  idle: 'cyan',
  work: 'green',
  think: 'yellow',
  alert: 'red',
  sleep: 'blue',
};

export interface DisplayFrame {
  glyph: string[];
  color: StateColor;
  state: PresenceState;
  name: string;
  message: string;
  /** Wall-clock time, HH:MM */
  clock: string;
}

export type DisplayPhase = 'created' | 'starting' | 'running' | 'stopped';
