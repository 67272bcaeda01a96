/**
 * Filesystem-backed storage
 */

import { randomBytes } from 'crypto';
import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import type { IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: 'utf-8'): string {
    return readFileSync(path, encoding);
  }

  /**
   * Write to a sibling temp file, then rename over the target.
   * rename(2) within one directory is atomic on POSIX filesystems.
   */
  replaceFile(path: string, data: string): void {
    const tmpPath = `${path}.tmp-${process.pid}-${tempSuffix()}`;
    try {
      writeFileSync(tmpPath, data, 'utf-8');
      renameSync(tmpPath, path);
    } catch (error) {
      try {
        if (existsSync(tmpPath)) unlinkSync(tmpPath);
      } catch {
        // temp file already gone
      }
      throw error;
    }
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdirp(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  unlink(path: string): void {
    unlinkSync(path);
  }
}

function tempSuffix(size = 6): string {
  return randomBytes(size).toString('base64url').slice(0, size);
}
