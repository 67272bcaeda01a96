/**
 * ANSI terminal renderer
 * Paints a full frame: clock, monogram, state label, message and name.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { IRenderer } from '../types/interfaces.js';
import type { DisplayFrame } from '../types/index.js';

export interface TerminalOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[2J';

function moveTo(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

function clip(text: string, width: number): string {
  return text.length > width ? text.slice(0, Math.max(0, width)) : text;
}

export class TerminalRenderer implements IRenderer {
  private cursorHidden = false;

  constructor(
    private out: TerminalOutput = process.stdout,
    private colors: ChalkInstance = chalk
  ) {}

  render(frame: DisplayFrame): void {
    const width = this.out.columns || 80;
    const height = this.out.rows || 24;
    const cx = Math.floor(width / 2);
    const cy = Math.floor(height / 2);
    const colors = this.colors;
    const paint = colors[frame.color];
    const sleeping = frame.state === 'sleep';

    let buffer = '';
    if (!this.cursorHidden) {
      buffer += HIDE_CURSOR;
      this.cursorHidden = true;
    }
    buffer += CLEAR_SCREEN;

    const put = (row: number, text: string, style: (s: string) => string): void => {
      if (row < 0 || row >= height || !text) return;
      const clipped = clip(text, width - 2);
      const col = Math.max(0, cx - Math.floor(clipped.length / 2));
      buffer += moveTo(row, col) + style(clipped);
    };

    put(1, frame.clock, colors.gray);

    // Center the glyph as a block so ragged rows keep their alignment
    const glyphWidth = Math.max(0, ...frame.glyph.map((line) => line.length));
    const glyphTop = cy - Math.floor(frame.glyph.length / 2) - 3;
    const glyphLeft = Math.max(0, cx - Math.floor(glyphWidth / 2));
    frame.glyph.forEach((line, i) => {
      const row = glyphTop + i;
      if (row < 0 || row >= height || !line) return;
      const style = sleeping ? colors.gray : colors.white;
      buffer += moveTo(row, glyphLeft) + style(clip(line, width - glyphLeft - 1));
    });

    const rule = '─'.repeat(Math.min(32, width - 2));
    const ruleRow = glyphTop + frame.glyph.length + 1;
    put(ruleRow, rule, sleeping ? colors.gray : paint);
    put(ruleRow + 3, frame.state.toUpperCase(), paint.bold);
    put(ruleRow + 5, frame.message, colors.gray);
    put(height - 2, frame.name, colors.gray);

    this.out.write(buffer);
  }

  dispose(): void {
    this.out.write(CLEAR_SCREEN + moveTo(0, 0) + SHOW_CURSOR);
    this.cursorHidden = false;
  }
}
