import { beforeEach, describe, expect, it } from 'vitest';
import { sgrToInstructions } from '../../src/ansi/sgr.js';
import { DEFAULT_COLOR } from '../../src/render/types.js';
import { getRuntimeMetric, getRuntimeMetricSnapshot, resetRuntimeMetrics } from '../../src/runtime/diagnostics.js';

describe('sgrToInstructions', () => {
  beforeEach(() => {
    resetRuntimeMetrics();
  });

  it('resets with code 0', () => {
    expect(sgrToInstructions(['0'])).toEqual([{ kind: 'reset' }]);
  });

  it('resets with empty parts', () => {
    expect(sgrToInstructions([])).toEqual([{ kind: 'reset' }]);
  });

  it('treats an empty parameter as 0', () => {
    expect(sgrToInstructions(['', '1'])).toEqual([
      { kind: 'reset' },
      { kind: 'set-attribute', attribute: 'bold', enabled: true },
    ]);
  });

  it('maps attribute codes on', () => {
    const codes = ['1', '2', '3', '4', '5', '6', '7', '8'];
    expect(sgrToInstructions(codes).map((i) => (i.kind === 'set-attribute' ? i.attribute : i.kind))).toEqual([
      'bold', 'dim', 'italic', 'underline', 'blink', 'blink', 'reverse', 'hidden',
    ]);
  });

  it('maps attribute codes off', () => {
    expect(sgrToInstructions(['23', '24', '25', '27', '28'])).toEqual([
      { kind: 'set-attribute', attribute: 'italic', enabled: false },
      { kind: 'set-attribute', attribute: 'underline', enabled: false },
      { kind: 'set-attribute', attribute: 'blink', enabled: false },
      { kind: 'set-attribute', attribute: 'reverse', enabled: false },
      { kind: 'set-attribute', attribute: 'hidden', enabled: false },
    ]);
  });

  it('clears both bold and dim with code 22', () => {
    expect(sgrToInstructions(['22'])).toEqual([
      { kind: 'set-attribute', attribute: 'bold', enabled: false },
      { kind: 'set-attribute', attribute: 'dim', enabled: false },
    ]);
  });

  it('sets standard and bright colors', () => {
    expect(sgrToInstructions(['31', '44', '97', '100'])).toEqual([
      { kind: 'set-foreground', color: 1 },
      { kind: 'set-background', color: 4 },
      { kind: 'set-foreground', color: 15 },
      { kind: 'set-background', color: 8 },
    ]);
  });

  it('restores default colors with 39 and 49', () => {
    expect(sgrToInstructions(['39', '49'])).toEqual([
      { kind: 'set-foreground', color: DEFAULT_COLOR },
      { kind: 'set-background', color: DEFAULT_COLOR },
    ]);
  });

  it('reads 256-color payloads', () => {
    expect(sgrToInstructions(['38', '5', '208', '48', '5', '17'])).toEqual([
      { kind: 'set-foreground', color: 208 },
      { kind: 'set-background', color: 17 },
    ]);
  });

  it('maps truecolor payloads to the nearest palette index', () => {
    expect(sgrToInstructions(['38', '2', '255', '0', '0'])).toEqual([{ kind: 'set-foreground', color: 196 }]);
    expect(sgrToInstructions(['48', '2', '128', '128', '128'])).toEqual([{ kind: 'set-background', color: 244 }]);
  });

  it('continues after an extended color', () => {
    expect(sgrToInstructions(['38', '5', '1', '1'])).toEqual([
      { kind: 'set-foreground', color: 1 },
      { kind: 'set-attribute', attribute: 'bold', enabled: true },
    ]);
  });

  it('yields a colorless instruction for an incomplete payload', () => {
    expect(sgrToInstructions(['38', '5'])).toEqual([{ kind: 'set-foreground', color: undefined }]);
    expect(sgrToInstructions(['48', '2', '1', '2'])).toEqual([{ kind: 'set-background', color: undefined }]);
  });

  it('yields a colorless instruction for an out-of-range index', () => {
    expect(sgrToInstructions(['38', '5', '300', '4'])).toEqual([
      { kind: 'set-foreground', color: undefined },
      { kind: 'set-attribute', attribute: 'underline', enabled: true },
    ]);
  });

  it('reads colon-form extended colors', () => {
    expect(sgrToInstructions(['38:5:208'])).toEqual([{ kind: 'set-foreground', color: 208 }]);
    expect(sgrToInstructions(['38:2:255:0:0'])).toEqual([{ kind: 'set-foreground', color: 196 }]);
    expect(sgrToInstructions(['48:2:0:128:128:128'])).toEqual([{ kind: 'set-background', color: 244 }]);
  });

  it('yields a colorless instruction for an incomplete colon payload', () => {
    expect(sgrToInstructions(['48:5'])).toEqual([{ kind: 'set-background', color: undefined }]);
    expect(sgrToInstructions(['38:2:1:2', '1'])).toEqual([
      { kind: 'set-foreground', color: undefined },
      { kind: 'set-attribute', attribute: 'bold', enabled: true },
    ]);
  });

  it('maps underline sub-parameters', () => {
    expect(sgrToInstructions(['4:0'])).toEqual([{ kind: 'set-attribute', attribute: 'underline', enabled: false }]);
    expect(sgrToInstructions(['4:5'])).toEqual([{ kind: 'set-attribute', attribute: 'underline', enabled: true }]);
  });

  it('counts colon groups it does not support', () => {
    expect(sgrToInstructions(['4:9', '58:5:1'])).toEqual([]);
    expect(getRuntimeMetric('sgr_unsupported', { code: '4:9' })).toBe(1);
    expect(getRuntimeMetric('sgr_unsupported', { code: '58:5:1' })).toBe(1);
  });

  it('counts unsupported codes and skips them', () => {
    expect(sgrToInstructions(['53', '1'])).toEqual([{ kind: 'set-attribute', attribute: 'bold', enabled: true }]);
    expect(sgrToInstructions(['abc'])).toEqual([]);
    expect(getRuntimeMetric('sgr_unsupported', { code: 53 })).toBe(1);
    expect(getRuntimeMetric('sgr_unsupported', { code: 'abc' })).toBe(1);
    expect(getRuntimeMetricSnapshot()).toEqual({
      'sgr_unsupported|code=53': 1,
      'sgr_unsupported|code=abc': 1,
    });
  });
});
