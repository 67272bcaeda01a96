/**
 * Data directory shared by the writer and the display
 */

import { join } from 'path';
import type { IEnvironment } from '../types/interfaces.js';

export const DATA_DIR_NAME = '.agent-presence';

export function resolveDataDir(env: IEnvironment): string {
  return env.get('PRESENCE_HOME') || join(env.homedir(), DATA_DIR_NAME);
}
