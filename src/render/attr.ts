/**
 * Attribute layout understood by the rendering surface.
 *
 * Bits 0-15 carry the color-pair slot, bits 16-22 the style flags.
 */

import { STYLE_FLAGS, type StyleFlag } from './types.js';

export const ATTR_NORMAL = 0;
export const ATTR_COLOR = 0xffff;

/** Largest pair count the slot field can address, slot 0 included. */
export const MAX_ENCODABLE_PAIRS = ATTR_COLOR + 1;

export const ATTR_BITS: Record<StyleFlag, number> = {
  bold: 1 << 16,
  dim: 1 << 17,
  italic: 1 << 18,
  underline: 1 << 19,
  blink: 1 << 20,
  reverse: 1 << 21,
  hidden: 1 << 22,
};

const ATTR_FLAGS = STYLE_FLAGS.reduce((mask, flag) => mask | ATTR_BITS[flag], 0);

export function encodeAttr(flags: number, slot: number): number {
  return (flags & ATTR_FLAGS) | (slot & ATTR_COLOR);
}

export function attrSlot(attr: number): number {
  return attr & ATTR_COLOR;
}

export function attrFlags(attr: number): number {
  return attr & ATTR_FLAGS;
}

export function hasFlag(attr: number, flag: StyleFlag): boolean {
  return (attr & ATTR_BITS[flag]) !== 0;
}

export function flagsOf(...flags: StyleFlag[]): number {
  return flags.reduce((mask, flag) => mask | ATTR_BITS[flag], 0);
}
