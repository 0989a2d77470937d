/**
 * Bounded-wait key input.
 *
 * `next(timeoutMs)` resolves with the next decoded key, or null once the
 * timeout passes with nothing typed. This wait is also the loop's tick.
 */

import { KeyDecoder, type KeyEvent } from './key-decoder.js';

export interface KeyInput {
  next(timeoutMs: number): Promise<KeyEvent | null>;
  close(): void;
}

export interface RawInputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

type Waiter = {
  resolve: (key: KeyEvent | null) => void;
  timer: NodeJS.Timeout;
};

export class StreamKeyInput implements KeyInput {
  private decoder = new KeyDecoder();
  private queue: KeyEvent[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  private readonly onData = (chunk: Buffer | string) => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    this.deliver(this.decoder.decode(text));
  };

  constructor(private stream: RawInputStream) {
    stream.on('data', this.onData);
    stream.resume();
  }

  next(timeoutMs: number): Promise<KeyEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('StreamKeyInput.next() called while a previous wait is pending'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        // A lone ESC is only known to be the Escape key once input goes quiet.
        const held = this.decoder.flush();
        resolve(held[0] ?? null);
        this.queue.push(...held.slice(1));
      }, Math.max(0, timeoutMs));
      this.waiter = { resolve, timer };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stream.off('data', this.onData);
    this.stream.pause();
    if (this.waiter) {
      clearTimeout(this.waiter.timer);
      this.waiter.resolve(null);
      this.waiter = null;
    }
  }

  private deliver(keys: KeyEvent[]): void {
    if (keys.length === 0) return;
    this.queue.push(...keys);
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      const first = this.queue.shift();
      resolve(first ?? null);
    }
  }
}
