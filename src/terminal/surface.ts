/**
 * Grid-addressable paint target the viewport projects onto.
 */
export interface RenderSurface {
  readonly rows: number;
  readonly cols: number;
  /** Re-read the physical size; returns true when it changed. */
  resize(): boolean;
  clear(): void;
  /** Paint `text` at (row, col); anything past the right edge is cut off. */
  paint(row: number, col: number, text: string, attr: number): void;
  flush(): void;
}
