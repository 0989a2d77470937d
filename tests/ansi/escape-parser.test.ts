import { beforeEach, describe, expect, it } from 'vitest';
import { tokenizeLine, type EscapeToken } from '../../src/ansi/escape-parser.js';
import { getRuntimeMetric, resetRuntimeMetrics } from '../../src/runtime/diagnostics.js';

function tokens(data: string): EscapeToken[] {
  const out: EscapeToken[] = [];
  tokenizeLine(data, (token) => out.push(token));
  return out;
}

describe('tokenizeLine', () => {
  beforeEach(() => {
    resetRuntimeMetrics();
  });

  it('emits plain text as one run', () => {
    expect(tokens('hello world')).toEqual([{ type: 'text', text: 'hello world' }]);
  });

  it('emits nothing for an empty line', () => {
    expect(tokens('')).toEqual([]);
  });

  it('splits text around CSI sequences', () => {
    expect(tokens('a\x1b[1;31mb')).toEqual([
      { type: 'text', text: 'a' },
      { type: 'csi', raw: '1;31', final: 'm' },
      { type: 'text', text: 'b' },
    ]);
  });

  it('emits tabs as their own token', () => {
    expect(tokens('a\tb')).toEqual([
      { type: 'text', text: 'a' },
      { type: 'tab' },
      { type: 'text', text: 'b' },
    ]);
  });

  it('drops OSC terminated by BEL or ST', () => {
    expect(tokens('\x1b]0;title\x07after')).toEqual([{ type: 'text', text: 'after' }]);
    expect(tokens('\x1b]8;;target\x1b\\link')).toEqual([{ type: 'text', text: 'link' }]);
    expect(getRuntimeMetric('escape_dropped', { kind: 'osc' })).toBe(2);
  });

  it('drops DCS strings', () => {
    expect(tokens('x\x1bPq#0\x1b\\y')).toEqual([
      { type: 'text', text: 'x' },
      { type: 'text', text: 'y' },
    ]);
    expect(getRuntimeMetric('escape_dropped', { kind: 'string' })).toBe(1);
  });

  it('drops charset selection', () => {
    expect(tokens('\x1b(Bx')).toEqual([{ type: 'text', text: 'x' }]);
    expect(getRuntimeMetric('escape_dropped', { kind: 'charset' })).toBe(1);
  });

  it('drops other two-byte escapes', () => {
    expect(tokens('\x1bMz')).toEqual([{ type: 'text', text: 'z' }]);
    expect(getRuntimeMetric('escape_dropped', { kind: 'escape', next: 'M' })).toBe(1);
  });

  it('drops C0 controls', () => {
    expect(tokens('\x07a\x08b')).toEqual([
      { type: 'text', text: 'a' },
      { type: 'text', text: 'b' },
    ]);
    expect(getRuntimeMetric('escape_dropped', { kind: 'control' })).toBe(2);
  });

  it('drops an unterminated CSI at the end of the line', () => {
    expect(tokens('ok\x1b[31')).toEqual([{ type: 'text', text: 'ok' }]);
    expect(getRuntimeMetric('escape_unterminated', { kind: 'csi' })).toBe(1);
  });

  it('drops a trailing lone ESC', () => {
    expect(tokens('ok\x1b')).toEqual([{ type: 'text', text: 'ok' }]);
    expect(getRuntimeMetric('escape_unterminated', { kind: 'escape' })).toBe(1);
  });

  it('drops an unterminated OSC', () => {
    expect(tokens('ok\x1b]0;title')).toEqual([{ type: 'text', text: 'ok' }]);
    expect(getRuntimeMetric('escape_unterminated', { kind: 'osc' })).toBe(1);
  });
});
