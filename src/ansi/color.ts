/**
 * xterm-256 palette helpers.
 */

/** Channel values of the 6x6x6 color cube (indexes 16-231). */
const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

/** Approximate RGB of the 16 system colors, xterm defaults. */
const SYSTEM_COLORS: Array<[number, number, number]> = [
  [0, 0, 0], [205, 0, 0], [0, 205, 0], [205, 205, 0], [0, 0, 238], [205, 0, 205], [0, 205, 205], [229, 229, 229],
  [127, 127, 127], [255, 0, 0], [0, 255, 0], [255, 255, 0], [92, 92, 255], [255, 0, 255], [0, 255, 255], [255, 255, 255],
];

export function isPaletteIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

export function xtermRgb(index: number): [number, number, number] | undefined {
  if (!isPaletteIndex(index)) return undefined;
  if (index < 16) return SYSTEM_COLORS[index];
  if (index >= 232) {
    const v = 8 + (index - 232) * 10;
    return [v, v, v];
  }
  const i = index - 16;
  return [CUBE_LEVELS[Math.floor(i / 36)], CUBE_LEVELS[Math.floor((i % 36) / 6)], CUBE_LEVELS[i % 6]];
}

function nearestCubeLevel(v: number): number {
  let best = 0;
  for (let i = 1; i < CUBE_LEVELS.length; i += 1) {
    if (Math.abs(CUBE_LEVELS[i] - v) < Math.abs(CUBE_LEVELS[best] - v)) best = i;
  }
  return best;
}

function distance(a: [number, number, number], b: [number, number, number]): number {
  return (a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2;
}

/**
 * Closest xterm-256 index for a 24-bit color, picked between the color cube
 * and the grayscale ramp. System colors 0-15 are never returned since their
 * RGB depends on the terminal theme.
 */
export function nearestXtermIndex(r: number, g: number, b: number): number {
  const rgb: [number, number, number] = [
    Math.max(0, Math.min(255, r)),
    Math.max(0, Math.min(255, g)),
    Math.max(0, Math.min(255, b)),
  ];

  const [ri, gi, bi] = rgb.map(nearestCubeLevel);
  const cubeIndex = 16 + 36 * ri + 6 * gi + bi;

  const avg = (rgb[0] + rgb[1] + rgb[2]) / 3;
  const grayStep = Math.max(0, Math.min(23, Math.round((avg - 8) / 10)));
  const grayIndex = 232 + grayStep;

  const cubeRgb = xtermRgb(cubeIndex) ?? rgb;
  const grayRgb = xtermRgb(grayIndex) ?? rgb;
  return distance(grayRgb, rgb) < distance(cubeRgb, rgb) ? grayIndex : cubeIndex;
}
