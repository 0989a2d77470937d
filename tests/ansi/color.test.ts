import { describe, expect, it } from 'vitest';
import { isPaletteIndex, nearestXtermIndex, xtermRgb } from '../../src/ansi/color.js';

describe('xtermRgb', () => {
  it('returns system colors', () => {
    expect(xtermRgb(1)).toEqual([205, 0, 0]);
    expect(xtermRgb(15)).toEqual([255, 255, 255]);
  });

  it('returns cube colors', () => {
    expect(xtermRgb(16)).toEqual([0, 0, 0]);
    expect(xtermRgb(196)).toEqual([255, 0, 0]);
    expect(xtermRgb(231)).toEqual([255, 255, 255]);
  });

  it('returns grayscale ramp colors', () => {
    expect(xtermRgb(232)).toEqual([8, 8, 8]);
    expect(xtermRgb(255)).toEqual([238, 238, 238]);
  });

  it('rejects values outside the palette', () => {
    expect(xtermRgb(256)).toBeUndefined();
    expect(xtermRgb(-1)).toBeUndefined();
    expect(xtermRgb(1.5)).toBeUndefined();
  });
});

describe('isPaletteIndex', () => {
  it('accepts integers 0-255 only', () => {
    expect(isPaletteIndex(0)).toBe(true);
    expect(isPaletteIndex(255)).toBe(true);
    expect(isPaletteIndex(256)).toBe(false);
    expect(isPaletteIndex(Number.NaN)).toBe(false);
  });
});

describe('nearestXtermIndex', () => {
  it('matches exact cube colors', () => {
    expect(nearestXtermIndex(255, 0, 0)).toBe(196);
    expect(nearestXtermIndex(0, 0, 0)).toBe(16);
  });

  it('prefers the gray ramp for neutral mid tones', () => {
    expect(nearestXtermIndex(128, 128, 128)).toBe(244);
  });

  it('clamps channels to 0-255', () => {
    expect(nearestXtermIndex(400, -20, -20)).toBe(196);
  });
});
