import { describe, expect, it } from 'vitest';
import {
  ENTER_SEQUENCE,
  LEAVE_SEQUENCE,
  TerminalSession,
  withTerminal,
  type TerminalInputStream,
  type TerminalOutputStream,
} from '../../src/terminal/session.js';

class FakeTtyInput implements TerminalInputStream {
  rawModes: boolean[] = [];

  constructor(public isTTY = true) {}

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  on(): this {
    return this;
  }

  off(): this {
    return this;
  }

  resume(): this {
    return this;
  }

  pause(): this {
    return this;
  }
}

class FakeTtyOutput implements TerminalOutputStream {
  written: string[] = [];
  columns = 80;
  rows = 24;

  constructor(public isTTY = true) {}

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }

  on(): this {
    return this;
  }

  off(): this {
    return this;
  }
}

describe('TerminalSession', () => {
  it('enters raw mode and the alternate screen', () => {
    const input = new FakeTtyInput();
    const output = new FakeTtyOutput();
    const session = new TerminalSession(input, output);
    session.enter();

    expect(session.isActive).toBe(true);
    expect(input.rawModes).toEqual([true]);
    expect(output.written).toEqual([ENTER_SEQUENCE]);
  });

  it('restores once', () => {
    const input = new FakeTtyInput();
    const output = new FakeTtyOutput();
    const session = new TerminalSession(input, output);
    session.enter();
    session.restore();
    session.restore();

    expect(session.isActive).toBe(false);
    expect(input.rawModes).toEqual([true, false]);
    expect(output.written).toEqual([ENTER_SEQUENCE, LEAVE_SEQUENCE]);
  });

  it('refuses a non-interactive output', () => {
    const output = new FakeTtyOutput(false);
    const session = new TerminalSession(new FakeTtyInput(), output);

    expect(() => session.enter()).toThrow('viewpane needs an interactive terminal on stdout');
    expect(output.written).toEqual([]);
  });

  it('leaves a non-TTY input alone', () => {
    const input = new FakeTtyInput(false);
    const session = new TerminalSession(input, new FakeTtyOutput());
    session.enter();
    session.restore();
    expect(input.rawModes).toEqual([]);
  });
});

describe('withTerminal', () => {
  it('returns the body result and restores', async () => {
    const output = new FakeTtyOutput();
    const session = new TerminalSession(new FakeTtyInput(), output);

    await expect(withTerminal(session, async () => 7)).resolves.toBe(7);
    expect(output.written).toEqual([ENTER_SEQUENCE, LEAVE_SEQUENCE]);
  });

  it('restores when the body throws', async () => {
    const output = new FakeTtyOutput();
    const session = new TerminalSession(new FakeTtyInput(), output);

    await expect(
      withTerminal(session, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(session.isActive).toBe(false);
    expect(output.written).toEqual([ENTER_SEQUENCE, LEAVE_SEQUENCE]);
  });
});
