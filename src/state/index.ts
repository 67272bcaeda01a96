/**
 * Status record persistence
 * Single-slot, last-writer-wins store shared by the writer and the display
 */

import { join } from 'path';
import { z } from 'zod';
import type { IClock, IStatusStore, IStorage } from '../types/interfaces.js';
import { PRESENCE_STATES, type StatusRecord, type StatusRecordInput } from '../types/index.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { systemClock } from '../infra/clock.js';
import { resolveDataDir } from '../infra/paths.js';
import { CorruptStateError, StoreUnavailableError, isNotFound } from '../errors.js';

const statusRecordSchema = z.object({
  state: z.enum(PRESENCE_STATES),
  message: z.string().default(''),
  updatedAt: z.number().finite().nonnegative(),
});

export class StatusStore implements IStatusStore {
  private storage: IStorage;
  private clock: IClock;
  private stateDir: string;
  private stateFile: string;

  constructor(storage?: IStorage, stateDir?: string, clock?: IClock) {
    this.storage = storage || new FileStorage();
    this.clock = clock || systemClock;
    this.stateDir = stateDir || resolveDataDir(new SystemEnvironment());
    this.stateFile = join(this.stateDir, 'state.json');
  }

  /**
   * Most recently written record, or undefined if nothing was ever written
   */
  read(): StatusRecord | undefined {
    let data: string;
    try {
      if (!this.storage.exists(this.stateFile)) {
        return undefined;
      }
      data = this.storage.readFile(this.stateFile, 'utf-8');
    } catch (error) {
      // Removed between the exists check and the read
      if (isNotFound(error)) return undefined;
      throw new StoreUnavailableError(this.stateFile, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new CorruptStateError(this.stateFile, { cause: error });
    }

    const parsed = statusRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptStateError(this.stateFile, { cause: parsed.error });
    }
    return parsed.data;
  }

  write(input: StatusRecordInput): StatusRecord {
    const record: StatusRecord = {
      state: input.state,
      message: input.message,
      updatedAt: input.updatedAt ?? this.clock.now().getTime(),
    };

    try {
      if (!this.storage.exists(this.stateDir)) {
        this.storage.mkdirp(this.stateDir);
      }
      this.storage.replaceFile(this.stateFile, JSON.stringify(record, null, 2));
    } catch (error) {
      throw new StoreUnavailableError(this.stateFile, { cause: error });
    }
    return record;
  }

  clear(): void {
    try {
      if (this.storage.exists(this.stateFile)) {
        this.storage.unlink(this.stateFile);
      }
    } catch (error) {
      if (isNotFound(error)) return;
      throw new StoreUnavailableError(this.stateFile, { cause: error });
    }
  }

  getStatePath(): string {
    return this.stateFile;
  }
}
