/**
 * SGR (Select Graphic Rendition) parameters to translator instructions.
 *
 * Pure function: one CSI `m` parameter list (split on `;`) in, the
 * equivalent list of style instructions out. A parameter may carry
 * colon-separated sub-parameters, as in `4:3` or `38:2::255:0:0`.
 */

import { incRuntimeMetric } from '../runtime/diagnostics.js';
import { DEFAULT_COLOR, type Color, type Instruction, type StyleFlag } from '../render/types.js';
import { isPaletteIndex, nearestXtermIndex } from './color.js';

const FLAG_ON: Record<number, StyleFlag> = {
  1: 'bold',
  2: 'dim',
  3: 'italic',
  4: 'underline',
  5: 'blink',
  6: 'blink',
  7: 'reverse',
  8: 'hidden',
};

const FLAG_OFF: Record<number, StyleFlag> = {
  23: 'italic',
  24: 'underline',
  25: 'blink',
  27: 'reverse',
  28: 'hidden',
};

type ExtendedColor = {
  color?: Color;
  consumed: number;
};

/** Highest `4:n` underline style (1 single .. 5 dashed); all render as underline. */
const MAX_UNDERLINE_STYLE = 5;

function colorFromRgb(values: string[]): Color | undefined {
  const [r, g, b] = values.map((v) => parseInt(v || '', 10));
  return [r, g, b].every((v) => Number.isFinite(v)) ? nearestXtermIndex(r, g, b) : undefined;
}

/**
 * Read the payload of a 38/48 code starting at `parts[start]` (the mode).
 * An incomplete or out-of-range payload yields no color.
 */
function readExtendedColor(parts: string[], start: number): ExtendedColor {
  const mode = parseInt(parts[start] ?? '', 10);
  if (mode === 5) {
    if (start + 1 >= parts.length) return { consumed: parts.length - start };
    const idx = parseInt(parts[start + 1] || '', 10);
    return { color: isPaletteIndex(idx) ? idx : undefined, consumed: 2 };
  }
  if (mode === 2) {
    if (start + 3 >= parts.length) return { consumed: parts.length - start };
    return { color: colorFromRgb(parts.slice(start + 1, start + 4)), consumed: 4 };
  }
  return { consumed: start < parts.length ? 1 : 0 };
}

/**
 * Colon form of a 38/48 payload, `subs` being everything after the code:
 * `5:n`, `2:r:g:b`, or `2:<colorspace>:r:g:b` with a possibly empty
 * colorspace id.
 */
function readColorGroup(subs: string[]): Color | undefined {
  const mode = parseInt(subs[0] ?? '', 10);
  if (mode === 5) {
    const idx = parseInt(subs[1] || '', 10);
    return isPaletteIndex(idx) ? idx : undefined;
  }
  if (mode === 2) {
    const rgb = subs.length >= 5 ? subs.slice(2, 5) : subs.slice(1, 4);
    return rgb.length === 3 ? colorFromRgb(rgb) : undefined;
  }
  return undefined;
}

/** One `code:sub:sub` parameter; sub-parameters never leak into the outer list. */
function subParameterInstructions(group: string, head: string, subs: string[]): Instruction[] {
  const code = parseInt(head, 10);
  if (code === 38) return [{ kind: 'set-foreground', color: readColorGroup(subs) }];
  if (code === 48) return [{ kind: 'set-background', color: readColorGroup(subs) }];
  if (code === 4) {
    const style = subs[0] === '' ? 0 : parseInt(subs[0], 10);
    if (style === 0) return [{ kind: 'set-attribute', attribute: 'underline', enabled: false }];
    if (style >= 1 && style <= MAX_UNDERLINE_STYLE) {
      return [{ kind: 'set-attribute', attribute: 'underline', enabled: true }];
    }
  }
  incRuntimeMetric('sgr_unsupported', { code: group });
  return [];
}

export function sgrToInstructions(parts: string[]): Instruction[] {
  if (parts.length === 0) return [{ kind: 'reset' }];

  const out: Instruction[] = [];
  for (let i = 0; i < parts.length; i += 1) {
    const [head, ...subs] = parts[i].split(':');
    if (subs.length > 0) {
      out.push(...subParameterInstructions(parts[i], head, subs));
      continue;
    }

    const code = parts[i] === '' ? 0 : parseInt(parts[i], 10);

    if (!Number.isFinite(code)) {
      incRuntimeMetric('sgr_unsupported', { code: parts[i] });
      continue;
    }
    if (code === 0) { out.push({ kind: 'reset' }); continue; }

    const on = FLAG_ON[code];
    if (on) { out.push({ kind: 'set-attribute', attribute: on, enabled: true }); continue; }
    const off = FLAG_OFF[code];
    if (off) { out.push({ kind: 'set-attribute', attribute: off, enabled: false }); continue; }

    if (code === 21 || code === 22) {
      out.push({ kind: 'set-attribute', attribute: 'bold', enabled: false });
      out.push({ kind: 'set-attribute', attribute: 'dim', enabled: false });
      continue;
    }

    if (code >= 30 && code <= 37) { out.push({ kind: 'set-foreground', color: code - 30 }); continue; }
    if (code >= 90 && code <= 97) { out.push({ kind: 'set-foreground', color: 8 + (code - 90) }); continue; }
    if (code >= 40 && code <= 47) { out.push({ kind: 'set-background', color: code - 40 }); continue; }
    if (code >= 100 && code <= 107) { out.push({ kind: 'set-background', color: 8 + (code - 100) }); continue; }
    if (code === 39) { out.push({ kind: 'set-foreground', color: DEFAULT_COLOR }); continue; }
    if (code === 49) { out.push({ kind: 'set-background', color: DEFAULT_COLOR }); continue; }

    if (code === 38 || code === 48) {
      const { color, consumed } = readExtendedColor(parts, i + 1);
      if (code === 38) out.push({ kind: 'set-foreground', color });
      else out.push({ kind: 'set-background', color });
      i += consumed;
      continue;
    }

    incRuntimeMetric('sgr_unsupported', { code });
  }

  return out;
}
