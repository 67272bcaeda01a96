/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import { z } from 'zod';
import type { PresenceConfig } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { resolveDataDir } from '../infra/paths.js';
import { InvalidConfigError, StoreUnavailableError, isNotFound } from '../errors.js';

export const DEFAULT_CONFIG: PresenceConfig = {
  letter: 'A',
  name: 'AGENT',
  idleTimeoutSeconds: 300,
  sleepStartHour: 0,
  sleepEndHour: 0,
};

const letterSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]$/, 'Letter must be a single character A-Z')
  .transform((value) => value.toUpperCase());
const nameSchema = z
  .string()
  .trim()
  .min(1, 'Name must not be empty')
  .transform((value) => value.toUpperCase());
const timeoutSchema = z.number().int('Timeout must be a whole number of seconds').min(0, 'Timeout must be 0 or more');
const hourSchema = z.number().int('Hour must be a whole number').min(0, 'Hour must be 0-23').max(23, 'Hour must be 0-23');

// Loading is lenient: a bad field is dropped and the next source applies
const storedConfigSchema = z.object({
  letter: letterSchema.optional().catch(undefined),
  name: nameSchema.optional().catch(undefined),
  idleTimeoutSeconds: timeoutSchema.optional().catch(undefined),
  sleepStartHour: hourSchema.optional().catch(undefined),
  sleepEndHour: hourSchema.optional().catch(undefined),
});

// Saving is strict
const configUpdateSchema = z
  .object({
    letter: letterSchema,
    name: nameSchema,
    idleTimeoutSeconds: timeoutSchema,
    sleepStartHour: hourSchema,
    sleepEndHour: hourSchema,
  })
  .partial();

export type StoredConfig = Partial<PresenceConfig>;

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private _config?: PresenceConfig;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || resolveDataDir(this.loadedEnv());
    this.configFile = join(this.configDir, 'config.json');
  }

  /**
   * Throws StoreUnavailableError or InvalidConfigError when config.json
   * exists but cannot be read or parsed.
   */
  get config(): PresenceConfig {
    if (!this._config) {
      this.loadedEnv();
      const stored = this.loadStoredConfig();
      const fromEnv = this.loadEnvConfig();

      // Merge: stored config > environment variables > defaults
      this._config = { ...DEFAULT_CONFIG, ...fromEnv, ...stored };
    }
    return this._config;
  }

  // Lazy load environment variables only once
  private loadedEnv(): IEnvironment {
    if (!this.envLoaded) {
      loadEnv();
      this.envLoaded = true;
    }
    return this.env;
  }

  /**
   * Stored settings. A missing file is empty; an unreadable or malformed
   * file throws, while a single bad field is dropped.
   */
  loadStoredConfig(): StoredConfig {
    let data: string;
    try {
      if (!this.storage.exists(this.configFile)) {
        return {};
      }
      data = this.storage.readFile(this.configFile, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return {};
      throw new StoreUnavailableError(this.configFile, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      throw new InvalidConfigError(`Config file is not valid JSON: ${this.configFile}`);
    }
    const parsed = storedConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidConfigError(`Config file must hold a JSON object: ${this.configFile}`);
    }
    return withoutUndefined(parsed.data);
  }

  private loadEnvConfig(): StoredConfig {
    const timeoutRaw = this.env.get('PRESENCE_IDLE_TIMEOUT');
    const parsed = storedConfigSchema.safeParse({
      letter: this.env.get('PRESENCE_LETTER'),
      name: this.env.get('PRESENCE_NAME'),
      idleTimeoutSeconds: timeoutRaw !== undefined ? Number(timeoutRaw) : undefined,
    });
    return parsed.success ? withoutUndefined(parsed.data) : {};
  }

  /**
   * Validate and persist settings. Throws InvalidConfigError on the first
   * invalid field; nothing is written in that case.
   */
  saveConfig(updates: StoredConfig): PresenceConfig {
    const parsed = configUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'config';
      throw new InvalidConfigError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
    }

    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }
    const current = this.loadStoredConfigForUpdate();
    const newConfig = { ...current, ...withoutUndefined(parsed.data) };
    this.storage.replaceFile(this.configFile, JSON.stringify(newConfig, null, 2));

    // Invalidate cached config
    this._config = undefined;
    return this.config;
  }

  // A malformed file is replaced rather than merged; an unreadable one still throws
  private loadStoredConfigForUpdate(): StoredConfig {
    try {
      return this.loadStoredConfig();
    } catch (error) {
      if (error instanceof InvalidConfigError) return {};
      throw error;
    }
  }

  /**
   * Drop the cached config so the next access re-reads the file.
   * Throws like `config`; the cached value is gone either way.
   */
  reload(): PresenceConfig {
    this._config = undefined;
    return this.config;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configFile;
  }
}

function withoutUndefined(value: StoredConfig): StoredConfig {
  const result: StoredConfig = {};
  if (value.letter !== undefined) result.letter = value.letter;
  if (value.name !== undefined) result.name = value.name;
  if (value.idleTimeoutSeconds !== undefined) result.idleTimeoutSeconds = value.idleTimeoutSeconds;
  if (value.sleepStartHour !== undefined) result.sleepStartHour = value.sleepStartHour;
  if (value.sleepEndHour !== undefined) result.sleepEndHour = value.sleepEndHour;
  return result;
}
