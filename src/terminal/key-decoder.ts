/**
 * Decoder for raw-mode terminal input.
 *
 * Turns stdin chunks into key events. An incomplete CSI/SS3 sequence at the
 * end of a chunk is kept and completed by the next chunk.
 */

export type KeyEvent = {
  /** Printable character, or a name such as `up`, `pagedown`, `escape`. */
  name: string;
  ctrl: boolean;
  alt: boolean;
  sequence: string;
};

const CSI_FINAL_KEYS: Record<string, string> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
};

const CSI_TILDE_KEYS: Record<string, string> = {
  '1': 'home',
  '2': 'insert',
  '3': 'delete',
  '4': 'end',
  '5': 'pageup',
  '6': 'pagedown',
  '7': 'home',
  '8': 'end',
};

const CONTROL_KEYS: Record<number, string> = {
  0x09: 'tab',
  0x0d: 'enter',
  0x0a: 'enter',
  0x7f: 'backspace',
  0x08: 'backspace',
};

type Decoded = { event: KeyEvent | null; consumed: number };

function key(name: string, sequence: string, ctrl = false, alt = false): KeyEvent {
  return { name, ctrl, alt, sequence };
}

/** Modifier field of `1;5A`-style parameters: 3 = alt, 5 = ctrl, 7 = both. */
function modifiers(params: string): { ctrl: boolean; alt: boolean } {
  const field = parseInt(params.split(';')[1] || '1', 10) - 1;
  if (!Number.isFinite(field) || field < 0) return { ctrl: false, alt: false };
  return { alt: (field & 2) !== 0, ctrl: (field & 4) !== 0 };
}

export class KeyDecoder {
  private pending = '';

  decode(chunk: string): KeyEvent[] {
    let data = this.pending + chunk;
    this.pending = '';
    const events: KeyEvent[] = [];

    while (data.length > 0) {
      const decoded = this.decodeOne(data);
      if (!decoded) {
        this.pending = data;
        break;
      }
      if (decoded.event) events.push(decoded.event);
      data = data.slice(decoded.consumed);
    }

    return events;
  }

  /** Flush a lone ESC held back as a possible sequence start. */
  flush(): KeyEvent[] {
    const held = this.pending;
    this.pending = '';
    return held === '\x1b' ? [key('escape', held)] : [];
  }

  private decodeOne(data: string): Decoded | null {
    const code = data.charCodeAt(0);

    if (code === 0x1b) return this.decodeEscape(data);

    const named = CONTROL_KEYS[code];
    if (named) return { event: key(named, data[0]), consumed: 1 };

    if (code < 0x20) {
      const letter = String.fromCharCode(code + 0x60);
      return { event: key(letter, data[0], true), consumed: 1 };
    }

    const cp = data.codePointAt(0);
    const ch = cp === undefined ? data[0] : String.fromCodePoint(cp);
    return { event: key(ch, ch), consumed: ch.length };
  }

  private decodeEscape(data: string): Decoded | null {
    if (data.length === 1) return null;
    const next = data[1];

    if (next === '[') {
      let end = 2;
      while (end < data.length && (data.charCodeAt(end) < 0x40 || data.charCodeAt(end) > 0x7e)) end += 1;
      if (end >= data.length) return null;
      const params = data.slice(2, end);
      const final = data[end];
      const sequence = data.slice(0, end + 1);
      const mods = modifiers(params);

      const arrow = CSI_FINAL_KEYS[final];
      if (arrow) return { event: key(arrow, sequence, mods.ctrl, mods.alt), consumed: end + 1 };
      if (final === '~') {
        const name = CSI_TILDE_KEYS[params.split(';')[0]];
        if (name) return { event: key(name, sequence, mods.ctrl, mods.alt), consumed: end + 1 };
      }
      return { event: null, consumed: end + 1 };
    }

    if (next === 'O') {
      if (data.length < 3) return null;
      const name = CSI_FINAL_KEYS[data[2]];
      return { event: name ? key(name, data.slice(0, 3)) : null, consumed: 3 };
    }

    if (next === '\x1b') return { event: key('escape', '\x1b'), consumed: 1 };

    const inner = this.decodeOne(data.slice(1));
    if (!inner || !inner.event) return { event: null, consumed: 2 };
    return {
      event: { ...inner.event, alt: true, sequence: data.slice(0, 1 + inner.consumed) },
      consumed: 1 + inner.consumed,
    };
  }
}
