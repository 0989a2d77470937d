/**
 * Escape-sequence tokenizer for one line of command output.
 *
 * Splits the line into printable runs, CSI sequences and tabs. Other
 * escapes (OSC, DCS, charset selection, ...) and C0 controls are dropped.
 * Lines are complete, so an unterminated sequence at the end is dropped
 * too instead of being carried forward.
 */

import { incRuntimeMetric } from '../runtime/diagnostics.js';

export type EscapeToken =
  | { type: 'text'; text: string }
  | { type: 'csi'; raw: string; final: string }
  | { type: 'tab' };

function skipToStringTerminator(data: string, from: number, allowBel: boolean): number {
  let j = from;
  while (j < data.length) {
    if (allowBel && data[j] === '\x07') return j + 1;
    if (data[j] === '\x1b' && data[j + 1] === '\\') return j + 2;
    j += 1;
  }
  return -1;
}

export function tokenizeLine(data: string, emit: (token: EscapeToken) => void): void {
  let i = 0;
  let runStart = 0;

  const flushRun = (end: number) => {
    if (end > runStart) emit({ type: 'text', text: data.slice(runStart, end) });
  };

  while (i < data.length) {
    const code = data.charCodeAt(i);

    if (code === 0x1b) {
      flushRun(i);
      const next = data[i + 1];
      if (next === undefined) {
        incRuntimeMetric('escape_unterminated', { kind: 'escape' });
        runStart = i = data.length;
        break;
      }

      if (next === '[') {
        let j = i + 2;
        while (j < data.length && (data.charCodeAt(j) < 0x40 || data.charCodeAt(j) > 0x7e)) j += 1;
        if (j >= data.length) {
          incRuntimeMetric('escape_unterminated', { kind: 'csi' });
          runStart = i = data.length;
          break;
        }
        emit({ type: 'csi', raw: data.slice(i + 2, j), final: data[j] });
        runStart = i = j + 1;
        continue;
      }

      if (next === ']' || next === 'P' || next === 'X' || next === '^' || next === '_') {
        const end = skipToStringTerminator(data, i + 2, next === ']');
        if (end < 0) {
          incRuntimeMetric('escape_unterminated', { kind: next === ']' ? 'osc' : 'string' });
          runStart = i = data.length;
          break;
        }
        incRuntimeMetric('escape_dropped', { kind: next === ']' ? 'osc' : 'string' });
        runStart = i = end;
        continue;
      }

      if ('()*+-./'.includes(next)) {
        incRuntimeMetric('escape_dropped', { kind: 'charset' });
        runStart = i = Math.min(data.length, i + 3);
        continue;
      }

      incRuntimeMetric('escape_dropped', { kind: 'escape', next });
      runStart = i = i + 2;
      continue;
    }

    if (code === 0x09) {
      flushRun(i);
      emit({ type: 'tab' });
      runStart = i = i + 1;
      continue;
    }

    if (code < 0x20 || code === 0x7f) {
      flushRun(i);
      incRuntimeMetric('escape_dropped', { kind: 'control' });
      runStart = i = i + 1;
      continue;
    }

    i += 1;
  }

  flushRun(data.length);
}
