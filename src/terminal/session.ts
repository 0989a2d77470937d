/**
 * Scoped ownership of the terminal.
 *
 * `withTerminal` switches to raw mode and the alternate screen, runs the
 * body, and restores the terminal on every way out, errors included.
 */

import { createLogger } from '../infra/logger.js';
import type { RawInputStream } from './key-input.js';
import type { TerminalOutput } from './ansi-surface.js';

const logger = createLogger('terminal');

export const ENTER_SEQUENCE = '\x1b[?1049h\x1b[?7l\x1b[2J\x1b[H';
export const LEAVE_SEQUENCE = '\x1b[0m\x1b[?7h\x1b[?25h\x1b[?1049l';

export interface TerminalInputStream extends RawInputStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutputStream extends TerminalOutput {
  isTTY?: boolean;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export class TerminalSession {
  private active = false;

  constructor(
    readonly input: TerminalInputStream,
    readonly output: TerminalOutputStream,
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  enter(): void {
    if (this.active) return;
    if (!this.output.isTTY) {
      throw new Error('viewpane needs an interactive terminal on stdout');
    }
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.output.write(ENTER_SEQUENCE);
    this.active = true;
    logger.debug('terminal acquired');
  }

  /** Safe to call more than once and from signal handlers. */
  restore(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(LEAVE_SEQUENCE);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    logger.debug('terminal restored');
  }
}

export async function withTerminal<T>(session: TerminalSession, body: () => Promise<T>): Promise<T> {
  session.enter();
  try {
    return await body();
  } finally {
    session.restore();
  }
}
