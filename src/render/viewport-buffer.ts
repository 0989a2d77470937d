/**
 * Virtual content buffer with a clamped scroll offset.
 *
 * The grid is resized to fit on every write: one row per line (at least
 * one) and one column more than the widest line, so scrolling to the right
 * edge never hides the last character. The offset survives writes and is
 * re-clamped to the new size.
 */

import type { RenderSurface } from '../terminal/surface.js';
import { ATTR_NORMAL } from './attr.js';
import type { Cell, RenderedSpan, ScrollOffset, ScrollTarget } from './types.js';

function makeCell(): Cell {
  return { ch: ' ', attr: ATTR_NORMAL };
}

function makeLine(cols: number): Cell[] {
  return Array.from({ length: cols }, () => makeCell());
}

function clampAxis(value: number, size: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(size - 1, Math.trunc(value)));
}

function resolveTarget(target: ScrollTarget, current: number, size: number): number {
  switch (target.kind) {
    case 'coordinate': return clampAxis(target.value, size);
    case 'min': return 0;
    case 'max': return size - 1;
    case 'unchanged': return current;
  }
}

function spanWidth(text: string): number {
  return Array.from(text).length;
}

export class ViewportBuffer {
  private grid: Cell[][] = [makeLine(1)];
  private offsetY = 0;
  private offsetX = 0;

  get rows(): number {
    return this.grid.length;
  }

  get cols(): number {
    return this.grid[0].length;
  }

  get offset(): ScrollOffset {
    return { y: this.offsetY, x: this.offsetX };
  }

  /** Replace the whole buffer with `lines`. */
  write(lines: Iterable<Iterable<RenderedSpan>>): void {
    const materialized: RenderedSpan[][] = [];
    let widest = 0;
    for (const line of lines) {
      const spans = Array.from(line);
      const width = spans.reduce((sum, span) => sum + spanWidth(span.text), 0);
      widest = Math.max(widest, width);
      materialized.push(spans);
    }

    const rows = Math.max(1, materialized.length);
    const cols = Math.max(1, widest) + 1;
    this.grid = Array.from({ length: rows }, () => makeLine(cols));

    materialized.forEach((spans, row) => {
      const line = this.grid[row];
      let col = 0;
      for (const span of spans) {
        for (const ch of span.text) {
          line[col] = { ch, attr: span.attr };
          col += 1;
        }
      }
    });

    this.offsetY = clampAxis(this.offsetY, rows);
    this.offsetX = clampAxis(this.offsetX, cols);
  }

  moveBy(dy: number, dx: number): void {
    this.offsetY = clampAxis(this.offsetY + dy, this.rows);
    this.offsetX = clampAxis(this.offsetX + dx, this.cols);
  }

  jumpTo(y: ScrollTarget, x: ScrollTarget): void {
    this.offsetY = resolveTarget(y, this.offsetY, this.rows);
    this.offsetX = resolveTarget(x, this.offsetX, this.cols);
  }

  /**
   * Scroll vertically by whole or fractional pages of `viewRows` rows;
   * `pages` of 1 is a page down, -0.5 half a page up.
   */
  scrollPages(pages: number, viewRows: number): void {
    const step = Math.trunc(pages * Math.max(1, viewRows));
    this.moveBy(step, 0);
  }

  getCell(row: number, col: number): Cell | undefined {
    const cell = this.grid[row]?.[col];
    return cell ? { ...cell } : undefined;
  }

  getRowText(row: number): string {
    const line = this.grid[row];
    return line ? line.map((cell) => cell.ch).join('') : '';
  }

  /**
   * Project the region at the current offset onto `surface`. Every cell of
   * rows `0..surface.rows-2` is painted, blanks included, so nothing from
   * an earlier render survives. The last surface row is left to the caller
   * for the status line.
   */
  render(surface: RenderSurface): void {
    const viewRows = Math.max(0, surface.rows - 1);
    const viewCols = Math.max(0, surface.cols);
    const lastCol = Math.min(this.cols, this.offsetX + viewCols);

    for (let r = 0; r < viewRows; r += 1) {
      const line = this.grid[this.offsetY + r];
      if (!line) {
        if (viewCols > 0) surface.paint(r, 0, ' '.repeat(viewCols), ATTR_NORMAL);
        continue;
      }

      let end = lastCol;
      while (end > this.offsetX && line[end - 1].ch === ' ' && line[end - 1].attr === ATTR_NORMAL) {
        end -= 1;
      }

      let runStart = this.offsetX;
      while (runStart < end) {
        const attr = line[runStart].attr;
        let runEnd = runStart + 1;
        while (runEnd < end && line[runEnd].attr === attr) runEnd += 1;
        const text = line.slice(runStart, runEnd).map((cell) => cell.ch).join('');
        surface.paint(r, runStart - this.offsetX, text, attr);
        runStart = runEnd;
      }

      const painted = end - this.offsetX;
      if (painted < viewCols) {
        surface.paint(r, painted, ' '.repeat(viewCols - painted), ATTR_NORMAL);
      }
    }
  }
}
