/**
 * RenderSurface over a terminal output stream.
 *
 * Keeps a cell grid the size of the terminal; `flush` writes the whole
 * frame as cursor moves plus SGR runs. Attributes are decoded with the
 * layout in render/attr.ts, and color slots are looked up in the registry.
 */

import { ATTR_BITS, ATTR_NORMAL, attrSlot } from '../render/attr.js';
import type { ColorPairLookup } from '../render/color-pair-registry.js';
import { STYLE_FLAGS, type Cell, type Color, type StyleFlag } from '../render/types.js';
import type { RenderSurface } from './surface.js';

export interface TerminalOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

const FLAG_SGR: Record<StyleFlag, number> = {
  bold: 1,
  dim: 2,
  italic: 3,
  underline: 4,
  blink: 5,
  reverse: 7,
  hidden: 8,
};

export const FALLBACK_COLS = 80;
export const FALLBACK_ROWS = 24;

function colorParams(color: Color, base: number, brightBase: number, extended: number): string[] {
  if (color < 0) return [];
  if (color < 8) return [String(base + color)];
  if (color < 16) return [String(brightBase + color - 8)];
  return [String(extended), '5', String(color)];
}

export function attrToSgr(attr: number, colors: ColorPairLookup): string {
  const params = ['0'];
  for (const flag of STYLE_FLAGS) {
    if (attr & ATTR_BITS[flag]) params.push(String(FLAG_SGR[flag]));
  }
  const pair = colors.pairOf(attrSlot(attr));
  if (pair) {
    params.push(...colorParams(pair.fg, 30, 90, 38));
    params.push(...colorParams(pair.bg, 40, 100, 48));
  }
  return `\x1b[${params.join(';')}m`;
}

function makeRow(cols: number): Cell[] {
  return Array.from({ length: cols }, () => ({ ch: ' ', attr: ATTR_NORMAL }));
}

export class AnsiSurface implements RenderSurface {
  private grid: Cell[][] = [];
  private width = 0;
  private height = 0;

  constructor(
    private output: TerminalOutput,
    private colors: ColorPairLookup,
  ) {
    this.resize();
  }

  get rows(): number {
    return this.height;
  }

  get cols(): number {
    return this.width;
  }

  resize(): boolean {
    const cols = Math.max(1, this.output.columns || FALLBACK_COLS);
    const rows = Math.max(1, this.output.rows || FALLBACK_ROWS);
    if (cols === this.width && rows === this.height) return false;
    this.width = cols;
    this.height = rows;
    this.clear();
    return true;
  }

  clear(): void {
    this.grid = Array.from({ length: this.height }, () => makeRow(this.width));
  }

  paint(row: number, col: number, text: string, attr: number): void {
    const line = this.grid[row];
    if (!line || col < 0) return;
    let c = col;
    for (const ch of text) {
      if (c >= this.width) break;
      line[c] = { ch, attr };
      c += 1;
    }
  }

  /** Text of one row without styling, for status checks and tests. */
  rowText(row: number): string {
    const line = this.grid[row];
    return line ? line.map((cell) => cell.ch).join('') : '';
  }

  flush(): void {
    let frame = '\x1b[?25l';
    this.grid.forEach((line, row) => {
      frame += `\x1b[${row + 1};1H`;
      let end = line.length;
      while (end > 0 && line[end - 1].ch === ' ' && line[end - 1].attr === ATTR_NORMAL) end -= 1;

      let current = -1;
      for (let c = 0; c < end; c += 1) {
        const cell = line[c];
        if (cell.attr !== current) {
          frame += attrToSgr(cell.attr, this.colors);
          current = cell.attr;
        }
        frame += cell.ch;
      }
      frame += '\x1b[0m\x1b[K';
    });
    frame += `\x1b[${this.height};1H\x1b[?25h`;
    this.output.write(frame);
  }
}
