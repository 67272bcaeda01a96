/**
 * Main entry point for agent-presence
 */

export * from './types/index.js';
export * from './errors.js';
export { StatusStore } from './state/index.js';
export { StatusWriter } from './status/writer.js';
export { ConfigManager, DEFAULT_CONFIG, type StoredConfig } from './config/index.js';
export {
  resolvePresence,
  isInSleepWindow,
  isStale,
  bootstrapRecord,
  secondsUntilIdle,
} from './presence/engine.js';
export { DisplayLoop, DEFAULT_INTERVAL_MS, type DisplayLoopOptions } from './display/loop.js';
export { TerminalRenderer, type TerminalOutput } from './display/renderer.js';
export { loadMonograms, glyphFor, type MonogramSet } from './display/monograms.js';
export { FileStorage } from './infra/storage.js';
export { SystemEnvironment } from './infra/environment.js';
export { SystemClock } from './infra/clock.js';
