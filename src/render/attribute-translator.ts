/**
 * Instruction-stream translator.
 *
 * Turns parsed text/style instructions into (text, attribute) spans. Style
 * carries over from one call to the next until an explicit reset, so a
 * color opened on one line keeps applying to the following lines.
 */

import { createLogger } from '../infra/logger.js';
import { incRuntimeMetric } from '../runtime/diagnostics.js';
import { ATTR_BITS, encodeAttr } from './attr.js';
import type { ColorPairRegistry } from './color-pair-registry.js';
import {
  DEFAULT_COLOR,
  type ColorPair,
  type Instruction,
  type RenderedSpan,
  type StyleState,
} from './types.js';

const logger = createLogger('translator');

export function createStyleState(): StyleState {
  return { flags: 0, colorSlot: 0 };
}

/**
 * Translate `instructions` against `state`, yielding spans as text arrives.
 *
 * Color changes collect into a pending pair that is resolved to a slot when
 * the next text is emitted (or the call ends), so `fg` followed by `bg`
 * registers one pair, not two.
 *
 * `state` is written back only after the last instruction, so a consumer
 * must drain the generator for the style to carry into the next call. A
 * registry capacity error escapes from the generator and leaves `state`
 * untouched.
 */
export function* translateInstructions(
  state: StyleState,
  registry: ColorPairRegistry,
  instructions: Iterable<Instruction>,
): Generator<RenderedSpan, void, undefined> {
  let flags = state.flags;
  let colorSlot = state.colorSlot;
  let pending: ColorPair | undefined;
  let pendingChanged = false;

  const settleColor = () => {
    if (!pending || !pendingChanged) return;
    colorSlot = registry.resolve(pending);
    pendingChanged = false;
  };

  for (const instruction of instructions) {
    switch (instruction.kind) {
      case 'text':
        settleColor();
        yield { text: instruction.text, attr: encodeAttr(flags, colorSlot) };
        break;

      case 'set-foreground':
      case 'set-background': {
        if (instruction.color === undefined) {
          logger.warn(`color instruction without a color: ${instruction.kind}`);
          incRuntimeMetric('translator_missing_color', { kind: instruction.kind });
          break;
        }
        pending ??= registry.pairOf(colorSlot) ?? { fg: DEFAULT_COLOR, bg: DEFAULT_COLOR };
        if (instruction.kind === 'set-foreground') pending.fg = instruction.color;
        else pending.bg = instruction.color;
        pendingChanged = true;
        break;
      }

      case 'set-attribute':
        if (instruction.attribute === 'normal') {
          flags = 0;
          colorSlot = 0;
          pending = undefined;
          pendingChanged = false;
        } else if (instruction.enabled) {
          flags |= ATTR_BITS[instruction.attribute];
        } else {
          flags &= ~ATTR_BITS[instruction.attribute];
        }
        break;

      case 'reset':
        flags = 0;
        colorSlot = 0;
        pending = undefined;
        pendingChanged = false;
        break;

      default: {
        const unhandled: never = instruction;
        logger.warn(`unrecognized instruction: ${JSON.stringify(unhandled)}`);
        incRuntimeMetric('translator_unrecognized_instruction');
      }
    }
  }

  settleColor();
  state.flags = flags;
  state.colorSlot = colorSlot;
}

export class AttributeTranslator {
  readonly state: StyleState;
  readonly registry: ColorPairRegistry;

  constructor(registry: ColorPairRegistry, initial?: Partial<StyleState>) {
    this.registry = registry;
    this.state = { ...createStyleState(), ...initial };
  }

  translate(instructions: Iterable<Instruction>): Generator<RenderedSpan, void, undefined> {
    return translateInstructions(this.state, this.registry, instructions);
  }

  /** Drop the active style; allocated color pairs stay registered. */
  resetStyle(): void {
    this.state.flags = 0;
    this.state.colorSlot = 0;
  }
}
