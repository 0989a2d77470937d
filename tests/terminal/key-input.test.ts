import { EventEmitter } from 'events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StreamKeyInput } from '../../src/terminal/key-input.js';

class FakeStdin extends EventEmitter {
  flowing = false;

  resume(): this {
    this.flowing = true;
    return this;
  }

  pause(): this {
    this.flowing = false;
    return this;
  }
}

describe('StreamKeyInput', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts the stream flowing', () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    expect(stdin.flowing).toBe(true);
    expect(stdin.listenerCount('data')).toBe(1);
    input.close();
  });

  it('returns keys typed before the wait', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    stdin.emit('data', Buffer.from('qj'));

    await expect(input.next(100)).resolves.toMatchObject({ name: 'q' });
    await expect(input.next(100)).resolves.toMatchObject({ name: 'j' });
    input.close();
  });

  it('resolves a pending wait when a key arrives', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    const pending = input.next(1000);
    stdin.emit('data', 'k');

    await expect(pending).resolves.toMatchObject({ name: 'k' });
    input.close();
  });

  it('resolves null when the timeout passes', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    const pending = input.next(100);
    vi.advanceTimersByTime(100);

    await expect(pending).resolves.toBeNull();
    input.close();
  });

  it('delivers a lone ESC once input goes quiet', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    stdin.emit('data', '\x1b');
    const pending = input.next(50);
    vi.advanceTimersByTime(50);

    await expect(pending).resolves.toMatchObject({ name: 'escape' });
    input.close();
  });

  it('rejects overlapping waits through the promise', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    const first = input.next(100);

    await expect(input.next(100)).rejects.toThrow('previous wait is pending');
    input.close();
    await expect(first).resolves.toBeNull();
  });

  it('settles the pending wait and detaches on close', async () => {
    const stdin = new FakeStdin();
    const input = new StreamKeyInput(stdin);
    const pending = input.next(10_000);
    input.close();

    await expect(pending).resolves.toBeNull();
    await expect(input.next(10)).resolves.toBeNull();
    expect(stdin.listenerCount('data')).toBe(0);
    expect(stdin.flowing).toBe(false);
  });
});
