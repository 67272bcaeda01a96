/**
 * Display loop
 * Re-evaluates the effective state on a fixed interval and forwards
 * changed frames to the renderer.
 */

import type { IClock, IConfigSource, IRenderer, IStatusStore } from '../types/interfaces.js';
import {
  STATE_COLORS,
  type DisplayFrame,
  type DisplayPhase,
  type EffectiveState,
  type PresenceConfig,
  type StatusRecord,
} from '../types/index.js';
import { systemClock } from '../infra/clock.js';
import { bootstrapRecord, resolvePresence } from '../presence/engine.js';
import { glyphFor, loadMonograms, type MonogramSet } from './monograms.js';
import { formatClock } from './format-time.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { CorruptStateError } from '../errors.js';

export const DEFAULT_INTERVAL_MS = 1000;

export interface DisplayLoopOptions {
  clock?: IClock;
  intervalMs?: number;
  monograms?: MonogramSet;
  /** Receives tick failures; the terminal belongs to the renderer, so none by default */
  log?: (message: string, error?: unknown) => void;
}

export class DisplayLoop {
  private phase: DisplayPhase = 'created';
  private timer?: ReturnType<typeof setInterval>;
  private config: PresenceConfig = DEFAULT_CONFIG;
  private bootstrap?: StatusRecord;
  private lastFrameKey: string | null = null;
  private lastEffective?: EffectiveState;
  private clock: IClock;
  private intervalMs: number;
  private monograms: MonogramSet;
  private log?: (message: string, error?: unknown) => void;

  constructor(
    private store: IStatusStore,
    private configSource: IConfigSource,
    private renderer: IRenderer,
    options: DisplayLoopOptions = {}
  ) {
    this.clock = options.clock || systemClock;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.monograms = options.monograms ?? loadMonograms();
    this.log = options.log;
  }

  start(): void {
    if (this.phase === 'starting' || this.phase === 'running') return;
    this.phase = 'starting';
    this.bootstrap = bootstrapRecord(this.clock.now());
    this.lastFrameKey = null;
    this.loadConfig();

    // Render once immediately, then on interval
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.phase = 'running';
  }

  stop(): void {
    if (this.phase === 'created' || this.phase === 'stopped') return;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.phase = 'stopped';
    this.lastFrameKey = null;
    this.renderer.dispose();
  }

  /**
   * Force a full repaint on the next tick (e.g. after a terminal resize)
   */
  refresh(): void {
    this.lastFrameKey = null;
  }

  getPhase(): DisplayPhase {
    return this.phase;
  }

  /**
   * Effective state of the last successful tick
   */
  getEffectiveState(): EffectiveState | undefined {
    return this.lastEffective;
  }

  /**
   * One refresh. Never throws: a bad tick keeps the previous frame on
   * screen and the next tick tries again.
   */
  tick(): void {
    if (this.phase !== 'starting' && this.phase !== 'running') return;

    const now = this.clock.now();
    this.loadConfig();

    const record = this.readRecord(now);
    if (!record) return;

    const effective = resolvePresence(record, this.config, now);
    this.lastEffective = effective;

    const frame = this.buildFrame(effective, now);
    const key = frameKey(frame, this.config.letter);
    if (key === this.lastFrameKey) return;

    try {
      this.renderer.render(frame);
      this.lastFrameKey = key;
    } catch (error) {
      this.log?.('Render failed', error);
    }
  }

  private loadConfig(): void {
    try {
      this.config = this.configSource.reload();
    } catch (error) {
      this.log?.('Config reload failed, keeping previous settings', error);
    }
  }

  private readRecord(now: Date): StatusRecord | undefined {
    const fallback = this.bootstrap ?? bootstrapRecord(now);
    try {
      return this.store.read() ?? fallback;
    } catch (error) {
      if (error instanceof CorruptStateError) {
        return fallback;
      }
      this.log?.('Status read failed, keeping last frame', error);
      return undefined;
    }
  }

  private buildFrame(effective: EffectiveState, now: Date): DisplayFrame {
    return {
      glyph: glyphFor(this.config.letter, this.monograms),
      color: STATE_COLORS[effective.state],
      state: effective.state,
      name: this.config.name,
      message: effective.message,
      clock: formatClock(now),
    };
  }
}

function frameKey(frame: DisplayFrame, letter: string): string {
  return JSON.stringify([letter, frame.state, frame.message, frame.name, frame.clock]);
}
