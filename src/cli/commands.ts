/**
 * Command handlers behind the presence CLI.
 * Each returns the process exit code.
 */

import chalk from 'chalk';
import type { IClock, IConfigSource, IStatusStore } from '../types/interfaces.js';
import { PRESENCE_STATES, STATE_COLORS, type PresenceConfig, type StatusRecord } from '../types/index.js';
import type { StatusWriter } from '../status/writer.js';
import type { ConfigManager, StoredConfig } from '../config/index.js';
import { bootstrapRecord, resolvePresence, secondsUntilIdle, isInSleepWindow } from '../presence/engine.js';
import { InvalidConfigError, InvalidStateError } from '../errors.js';
import { formatClock } from '../display/format-time.js';

export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function formatStatusLine(record: Pick<StatusRecord, 'state' | 'message'>): string {
  const label = record.state.toUpperCase();
  const text = record.message ? `${label}: ${record.message}` : label;
  return chalk[STATE_COLORS[record.state]](text);
}

export function runStatus(writer: StatusWriter, stateName: string, words: string[], io: CommandIO = consoleIO): number {
  try {
    const record = writer.submit(stateName, words.join(' '));
    io.out(formatStatusLine(record));
    return 0;
  } catch (error) {
    if (error instanceof InvalidStateError) {
      io.err(chalk.red(`Error: Invalid state '${error.stateName.trim().toLowerCase()}'`));
      io.err(chalk.gray(`Valid states: ${[...PRESENCE_STATES].sort().join(', ')}`));
      return 1;
    }
    io.err(chalk.red(`Error writing state file: ${describeError(error)}`));
    return 1;
  }
}

export function runClear(store: IStatusStore, io: CommandIO = consoleIO): number {
  try {
    store.clear();
    io.out(chalk.gray('Status cleared'));
    return 0;
  } catch (error) {
    io.err(chalk.red(`Error clearing state file: ${describeError(error)}`));
    return 1;
  }
}

/**
 * Print the persisted record and what the display would show for it now.
 * With no record the display's bootstrap default is resolved instead.
 */
export function runShowStatus(
  store: IStatusStore,
  configSource: IConfigSource,
  clock: IClock,
  io: CommandIO = consoleIO
): number {
  let config: PresenceConfig;
  try {
    config = configSource.reload();
  } catch (error) {
    io.err(chalk.red(`Error reading config file: ${describeError(error)}`));
    return 1;
  }

  let record: StatusRecord | undefined;
  try {
    record = store.read();
  } catch (error) {
    io.err(chalk.red(`Error reading state file: ${describeError(error)}`));
    return 1;
  }

  const now = clock.now();
  const effective = resolvePresence(record ?? bootstrapRecord(now), config, now);
  if (record) {
    io.out(`Persisted: ${formatStatusLine(record)} ${chalk.gray(`(at ${formatClock(new Date(record.updatedAt))})`)}`);
  } else {
    io.out(chalk.gray('No status written yet'));
  }
  io.out(`Effective: ${formatStatusLine(effective)}`);

  if (isInSleepWindow(now.getHours(), config.sleepStartHour, config.sleepEndHour)) {
    io.out(chalk.gray(`Sleep window ${config.sleepStartHour}:00-${config.sleepEndHour}:00 is active`));
  } else if (record) {
    const remaining = secondsUntilIdle(record, config, now);
    if (remaining === null) {
      io.out(chalk.gray('Auto-idle disabled'));
    } else if (remaining > 0) {
      io.out(chalk.gray(`Idle in ${remaining}s`));
    }
  }
  return 0;
}

export interface ConfigOptions {
  letter?: string;
  name?: string;
  timeout?: string;
  /** "start-end" hours, or false from --no-sleep */
  sleep?: string | boolean;
  show?: boolean;
}

/**
 * Parse "23-7" into a sleep window
 */
export function parseSleepWindow(value: string): { sleepStartHour: number; sleepEndHour: number } {
  const match = /^\s*(\d{1,2})\s*-\s*(\d{1,2})\s*$/.exec(value);
  if (!match) {
    throw new InvalidConfigError(`Invalid sleep window '${value}'. Expected <start>-<end> hours, e.g. 23-7`);
  }
  return { sleepStartHour: Number(match[1]), sleepEndHour: Number(match[2]) };
}

export function runConfig(manager: ConfigManager, options: ConfigOptions, io: CommandIO = consoleIO): number {
  const updates: StoredConfig = {};
  try {
    if (options.show) {
      io.out(JSON.stringify(manager.config, null, 2));
      return 0;
    }

    if (options.letter !== undefined) updates.letter = options.letter;
    if (options.name !== undefined) updates.name = options.name;
    if (options.timeout !== undefined) {
      const timeout = Number(options.timeout);
      if (!Number.isInteger(timeout)) {
        throw new InvalidConfigError(`Invalid timeout '${options.timeout}'. Expected whole seconds`);
      }
      updates.idleTimeoutSeconds = Math.max(0, timeout);
    }
    if (typeof options.sleep === 'string') {
      Object.assign(updates, parseSleepWindow(options.sleep));
    } else if (options.sleep === false) {
      updates.sleepStartHour = 0;
      updates.sleepEndHour = 0;
    }

    if (Object.keys(updates).length === 0) {
      io.out('Current configuration:');
      io.out(JSON.stringify(manager.config, null, 2));
      io.out('');
      io.out(chalk.gray('Use --help to see options'));
      return 0;
    }

    const saved = manager.saveConfig(updates);
    io.out(chalk.green('Configuration updated:'));
    io.out(JSON.stringify(saved, null, 2));
    return 0;
  } catch (error) {
    io.err(chalk.red(`Error: ${describeError(error)}`));
    return 1;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
