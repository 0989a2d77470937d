/**
 * Allocator for color-pair slots.
 *
 * Each distinct (fg, bg) pair gets one slot, handed out in increasing order
 * from 1. Slot 0 means "no color override" and is never allocated. Mappings
 * live as long as the registry.
 */

import { MAX_ENCODABLE_PAIRS } from './attr.js';
import { DEFAULT_COLOR, type ColorPair } from './types.js';

export const DEFAULT_MAX_COLOR_PAIRS = 256;

export class ColorPairCapacityError extends Error {
  readonly pair: ColorPair;
  readonly maxPairs: number;

  constructor(pair: ColorPair, maxPairs: number) {
    super(`Color pair (${pair.fg}, ${pair.bg}) does not fit: all ${maxPairs - 1} color-pair slots are in use`);
    this.name = 'ColorPairCapacityError';
    this.pair = pair;
    this.maxPairs = maxPairs;
  }
}

/** Read side of the registry, as seen by a rendering surface. */
export interface ColorPairLookup {
  pairOf(slot: number): ColorPair | undefined;
}

function pairKey(pair: ColorPair): string {
  return `${pair.fg}:${pair.bg}`;
}

export type ColorPairRegistryOptions = {
  /** Pair count including the reserved slot 0; slots 1..maxPairs-1 can be handed out. */
  maxPairs?: number;
};

export class ColorPairRegistry implements ColorPairLookup {
  private slots = new Map<string, number>();
  private pairs: ColorPair[] = [{ fg: DEFAULT_COLOR, bg: DEFAULT_COLOR }];
  readonly capacity: number;

  constructor(options: ColorPairRegistryOptions = {}) {
    const requested = options.maxPairs ?? DEFAULT_MAX_COLOR_PAIRS;
    if (!Number.isInteger(requested) || requested < 1 || requested > MAX_ENCODABLE_PAIRS) {
      throw new RangeError(`maxPairs must be an integer between 1 and ${MAX_ENCODABLE_PAIRS}, got ${requested}`);
    }
    this.capacity = requested;
  }

  /** Number of allocated slots (slot 0 excluded). */
  get size(): number {
    return this.pairs.length - 1;
  }

  resolve(pair: ColorPair): number {
    const key = pairKey(pair);
    const existing = this.slots.get(key);
    if (existing !== undefined) return existing;

    const slot = this.pairs.length;
    if (slot >= this.capacity) {
      throw new ColorPairCapacityError(pair, this.capacity);
    }
    this.pairs.push({ fg: pair.fg, bg: pair.bg });
    this.slots.set(key, slot);
    return slot;
  }

  pairOf(slot: number): ColorPair | undefined {
    const pair = this.pairs[slot];
    return pair ? { ...pair } : undefined;
  }

  entries(): Array<[number, ColorPair]> {
    return this.pairs.slice(1).map((pair, i) => [i + 1, { ...pair }]);
  }
}
