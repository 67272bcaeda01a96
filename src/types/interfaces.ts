/**
 * Seams for the filesystem, environment, clock and terminal so that
 * each component can be exercised in-process.
 */

import type { DisplayFrame, PresenceConfig, StatusRecord, StatusRecordInput } from './index.js';

export interface IStorage {
  readFile(path: string, encoding: 'utf-8'): string;
  /**
   * Replace the file's content in one step: a concurrent reader sees either
   * the previous content or the new content, never a mix.
   */
  replaceFile(path: string, data: string): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
  unlink(path: string): void;
}

export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
}

export interface IClock {
  now(): Date;
}

export interface IStatusStore {
  read(): StatusRecord | undefined;
  write(record: StatusRecordInput): StatusRecord;
  clear(): void;
}

export interface IConfigSource {
  /** Re-read the persisted settings */
  reload(): PresenceConfig;
}

export interface IRenderer {
  render(frame: DisplayFrame): void;
  dispose(): void;
}
