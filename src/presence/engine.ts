/**
 * Effective state resolution
 *
 * Pure function of (record, config, now). Precedence:
 *   1. sleep window  -> { sleep, '' }
 *   2. stale record  -> { idle, '' }
 *   3. fresh record  -> record state and message
 */

import type { EffectiveState, PresenceConfig, StatusRecord } from '../types/index.js';

const HOURS_PER_DAY = 24;

/**
 * Whether `hour` lies in [start, end). The window wraps past midnight when
 * start > end, so 23 -> 7 covers 23, 0, 1, ..., 6. start === end is empty.
 */
export function isInSleepWindow(hour: number, start: number, end: number): boolean {
  const h = ((hour % HOURS_PER_DAY) + HOURS_PER_DAY) % HOURS_PER_DAY;
  if (start === end) return false;
  if (start < end) return h >= start && h < end;
  return h >= start || h < end;
}

/**
 * Stand-in record used when nothing was written yet or the file is corrupt
 */
export function bootstrapRecord(now: Date): StatusRecord {
  return { state: 'idle', message: '', updatedAt: now.getTime() };
}

/**
 * Milliseconds since the record was written. A timestamp in the future
 * (clock skew between processes) counts as zero.
 */
export function elapsedMs(record: StatusRecord, now: Date): number {
  return Math.max(0, now.getTime() - record.updatedAt);
}

export function isStale(record: StatusRecord, config: PresenceConfig, now: Date): boolean {
  if (config.idleTimeoutSeconds <= 0) return false;
  return elapsedMs(record, now) >= config.idleTimeoutSeconds * 1000;
}

/**
 * Whole seconds left before the record decays to idle, or null when decay
 * is disabled.
 */
export function secondsUntilIdle(record: StatusRecord, config: PresenceConfig, now: Date): number | null {
  if (config.idleTimeoutSeconds <= 0) return null;
  const remainingMs = config.idleTimeoutSeconds * 1000 - elapsedMs(record, now);
  return Math.max(0, Math.ceil(remainingMs / 1000));
}

export function resolvePresence(record: StatusRecord, config: PresenceConfig, now: Date): EffectiveState {
  if (isInSleepWindow(now.getHours(), config.sleepStartHour, config.sleepEndHour)) {
    return { state: 'sleep', message: '' };
  }

  if (isStale(record, config, now)) {
    return { state: 'idle', message: '' };
  }

  return { state: record.state, message: record.message };
}
