/**
 * Types shared by the translator, the color-pair registry and the viewport.
 */

export const STYLE_FLAGS = ['bold', 'dim', 'italic', 'underline', 'blink', 'reverse', 'hidden'] as const;

export type StyleFlag = (typeof STYLE_FLAGS)[number];

/** Palette index 0-255, or DEFAULT_COLOR for the terminal's own color. */
export type Color = number;

export const DEFAULT_COLOR: Color = -1;

export type ColorPair = {
  fg: Color;
  bg: Color;
};

export type Instruction =
  | { kind: 'text'; text: string }
  | { kind: 'set-foreground'; color?: Color }
  | { kind: 'set-background'; color?: Color }
  | { kind: 'set-attribute'; attribute: StyleFlag | 'normal'; enabled: boolean }
  | { kind: 'reset' };

export type RenderedSpan = {
  text: string;
  attr: number;
};

/**
 * Running translator state between calls.
 * `colorSlot` is 0 or a slot handed out by the registry.
 */
export interface StyleState {
  flags: number;
  colorSlot: number;
}

export type Cell = {
  ch: string;
  attr: number;
};

export type ScrollTarget =
  | { kind: 'coordinate'; value: number }
  | { kind: 'min' }
  | { kind: 'max' }
  | { kind: 'unchanged' };

export const SCROLL_MIN: ScrollTarget = { kind: 'min' };
export const SCROLL_MAX: ScrollTarget = { kind: 'max' };
export const SCROLL_UNCHANGED: ScrollTarget = { kind: 'unchanged' };

export function scrollAt(value: number): ScrollTarget {
  return { kind: 'coordinate', value };
}

export type ScrollOffset = {
  y: number;
  x: number;
};
