/**
 * Raw escape-coded text to translator instructions.
 */

import type { Instruction } from '../render/types.js';
import { incRuntimeMetric } from '../runtime/diagnostics.js';
import { tokenizeLine } from './escape-parser.js';
import { sgrToInstructions } from './sgr.js';

export const TAB_WIDTH = 8;

function codepointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Parse one line (no embedded newline) into an instruction stream.
 * SGR sequences become style instructions, tabs expand to the next
 * 8-column stop, and other CSI sequences are dropped.
 */
export function parseLine(raw: string): Instruction[] {
  const out: Instruction[] = [];
  let column = 0;

  const pushText = (text: string) => {
    const last = out[out.length - 1];
    if (last && last.kind === 'text') {
      last.text += text;
    } else {
      out.push({ kind: 'text', text });
    }
    column += codepointLength(text);
  };

  tokenizeLine(raw, (token) => {
    switch (token.type) {
      case 'text':
        pushText(token.text);
        break;
      case 'tab':
        pushText(' '.repeat(TAB_WIDTH - (column % TAB_WIDTH)));
        break;
      case 'csi':
        if (token.final === 'm' && !/^[<=>?]/.test(token.raw)) {
          out.push(...sgrToInstructions(token.raw === '' ? [] : token.raw.split(';')));
        } else {
          incRuntimeMetric('escape_dropped', { kind: 'csi', final: token.final });
        }
        break;
    }
  });

  return out;
}

/**
 * Split captured output into lines the way a line-oriented reader would:
 * `\n`, `\r\n` and lone `\r` all end a line, and a trailing terminator does
 * not produce an empty last line.
 */
export function splitOutputLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
