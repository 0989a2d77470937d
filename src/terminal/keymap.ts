/**
 * Key to action table for the viewer.
 */

import {
  SCROLL_MAX,
  SCROLL_MIN,
  SCROLL_UNCHANGED,
  type ScrollTarget,
} from '../render/types.js';
import type { KeyEvent } from './key-decoder.js';

export type ViewerAction =
  | { type: 'move'; dy: number; dx: number }
  | { type: 'page'; pages: number }
  | { type: 'jump'; y: ScrollTarget; x: ScrollTarget }
  | { type: 'refresh' }
  | { type: 'quit' };

export type KeyMap = ReadonlyMap<string, ViewerAction>;

/** `C-d` for ctrl+d, `M-x` for alt+x, plain name otherwise. */
export function keyId(event: KeyEvent): string {
  let id = event.name;
  if (event.ctrl) id = `C-${id}`;
  if (event.alt) id = `M-${id}`;
  return id;
}

const move = (dy: number, dx: number): ViewerAction => ({ type: 'move', dy, dx });
const page = (pages: number): ViewerAction => ({ type: 'page', pages });
const jump = (y: ScrollTarget, x: ScrollTarget): ViewerAction => ({ type: 'jump', y, x });

export const DEFAULT_KEYMAP: KeyMap = new Map<string, ViewerAction>([
  ['q', { type: 'quit' }],
  ['Q', { type: 'quit' }],
  ['C-c', { type: 'quit' }],

  ['up', move(-1, 0)],
  ['k', move(-1, 0)],
  ['down', move(1, 0)],
  ['j', move(1, 0)],
  ['enter', move(1, 0)],
  ['left', move(0, -1)],
  ['h', move(0, -1)],
  ['right', move(0, 1)],
  ['l', move(0, 1)],

  ['pagedown', page(1)],
  [' ', page(1)],
  ['f', page(1)],
  ['C-f', page(1)],
  ['pageup', page(-1)],
  ['b', page(-1)],
  ['C-b', page(-1)],
  ['C-d', page(0.5)],
  ['d', page(0.5)],
  ['C-u', page(-0.5)],
  ['u', page(-0.5)],

  ['home', jump(SCROLL_MIN, SCROLL_MIN)],
  ['g', jump(SCROLL_MIN, SCROLL_UNCHANGED)],
  ['end', jump(SCROLL_MAX, SCROLL_UNCHANGED)],
  ['G', jump(SCROLL_MAX, SCROLL_UNCHANGED)],
  ['0', jump(SCROLL_UNCHANGED, SCROLL_MIN)],
  ['^', jump(SCROLL_UNCHANGED, SCROLL_MIN)],
  ['$', jump(SCROLL_UNCHANGED, SCROLL_MAX)],

  ['r', { type: 'refresh' }],
  ['C-l', { type: 'refresh' }],
]);

export function lookupAction(keymap: KeyMap, event: KeyEvent): ViewerAction | undefined {
  return keymap.get(keyId(event));
}
