/**
 * Watch loop: run the command, translate its output into the viewport,
 * render, then wait for keys until the redraw interval has passed.
 */

import { performance } from 'perf_hooks';
import { parseLine, splitOutputLines } from '../ansi/line-parser.js';
import type { ViewerConfig } from '../config/index.js';
import { createLogger, truncateContent } from '../infra/logger.js';
import { flagsOf } from '../render/attr.js';
import { AttributeTranslator } from '../render/attribute-translator.js';
import { ColorPairCapacityError, type ColorPairRegistry } from '../render/color-pair-registry.js';
import type { Instruction, RenderedSpan, ScrollOffset } from '../render/types.js';
import { ViewportBuffer } from '../render/viewport-buffer.js';
import type { KeyEvent } from '../terminal/key-decoder.js';
import type { KeyInput } from '../terminal/key-input.js';
import { DEFAULT_KEYMAP, keyId, lookupAction, type KeyMap, type ViewerAction } from '../terminal/keymap.js';
import type { RenderSurface } from '../terminal/surface.js';
import {
  CommandFailedError,
  describeCommand,
  type CommandResult,
  type CommandRunner,
  type WatchedCommand,
} from './command-runner.js';
import { incRuntimeMetric } from './diagnostics.js';

const logger = createLogger('controller');

const STATUS_ATTR = flagsOf('reverse');

export type ActionOutcome = 'render' | 'refresh' | 'quit' | 'ignored';

export type WatchControllerDeps = {
  command: WatchedCommand;
  config: ViewerConfig;
  runner: CommandRunner;
  surface: RenderSurface;
  input: KeyInput;
  registry: ColorPairRegistry;
  parse?: (raw: string) => Instruction[];
  keymap?: KeyMap;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
};

export function withoutColor(instructions: Instruction[]): Instruction[] {
  return instructions.filter((ins) => ins.kind !== 'set-foreground' && ins.kind !== 'set-background');
}

/** Left text, right text, padded apart and cut to `width` columns. */
export function formatStatusLine(left: string, right: string, width: number): string {
  if (width <= 0) return '';
  if (right.length >= width) return right.slice(0, width);
  const room = width - right.length - (right ? 1 : 0);
  const shownLeft = left.length > room ? left.slice(0, room) : left;
  return shownLeft + ' '.repeat(width - shownLeft.length - right.length) + right;
}

export class WatchController {
  readonly viewport = new ViewportBuffer();
  private translator: AttributeTranslator;
  private parse: (raw: string) => Instruction[];
  private keymap: KeyMap;
  private now: () => number;
  private lastResult: CommandResult | null = null;
  private colorExhausted = false;
  private resizePending = false;
  private running = false;

  constructor(private deps: WatchControllerDeps) {
    this.translator = new AttributeTranslator(deps.registry);
    this.parse = deps.parse ?? parseLine;
    this.keymap = deps.keymap ?? DEFAULT_KEYMAP;
    this.now = deps.now ?? (() => performance.now());
  }

  get offset(): ScrollOffset {
    return this.viewport.offset;
  }

  get lastExitStatus(): number | null {
    return this.lastResult ? this.lastResult.exitStatus : null;
  }

  get isColorExhausted(): boolean {
    return this.colorExhausted;
  }

  /** Re-read the surface size before the next wait finishes. */
  requestResize(): void {
    this.resizePending = true;
  }

  stop(): void {
    this.running = false;
  }

  /** One redraw cycle's data half: run, parse, translate, write. */
  refresh(): void {
    const { command, config, runner } = this.deps;
    const result = runner.run(command);
    this.lastResult = result;
    logger.debug(`ran \`${truncateContent(describeCommand(command))}\`: status=${result.exitStatus} bytes=${result.output.length}`);

    if (config.errexit && result.exitStatus !== 0) {
      throw new CommandFailedError(describeCommand(command), result);
    }

    // Style does not leak from one run's output into the next.
    this.translator.resetStyle();
    const lines = splitOutputLines(result.output).map((raw) => this.translateLine(this.parse(raw)));
    this.viewport.write(lines);
  }

  render(): void {
    const { surface } = this.deps;
    surface.clear();
    this.viewport.render(surface);
    const status = this.statusText();
    if (status.trim().length > 0) {
      surface.paint(surface.rows - 1, 0, status, STATUS_ATTR);
    }
    surface.flush();
  }

  statusText(): string {
    const { config, command, surface } = this.deps;
    const right: string[] = [];
    if (this.colorExhausted) right.push('color pairs exhausted');

    let left = '';
    if (config.showStatus) {
      left = `Every ${config.interval.toFixed(1)}s: ${describeCommand(command)}`;
      const result = this.lastResult;
      if (result) {
        right.push(result.signal ? `signal ${result.signal}` : `exit ${result.exitStatus}`);
      }
      const { y, x } = this.viewport.offset;
      right.push(`${y + 1},${x + 1}`);
    }
    return formatStatusLine(left, right.join('  '), surface.cols);
  }

  handleKey(event: KeyEvent): ActionOutcome {
    const action = lookupAction(this.keymap, event);
    if (!action) {
      logger.debug(`no action for key ${keyId(event)}`);
      incRuntimeMetric('key_unmapped', { key: keyId(event) });
      return 'ignored';
    }
    return this.apply(action);
  }

  apply(action: ViewerAction): ActionOutcome {
    switch (action.type) {
      case 'move':
        this.viewport.moveBy(action.dy, action.dx);
        return 'render';
      case 'page':
        this.viewport.scrollPages(action.pages, this.deps.surface.rows - 1);
        return 'render';
      case 'jump':
        this.viewport.jumpTo(action.y, action.x);
        return 'render';
      case 'refresh':
        return 'refresh';
      case 'quit':
        return 'quit';
    }
  }

  /** Runs until a quit key or `stop()`; resolves with the exit code. */
  async run(): Promise<number> {
    const { config, input, surface } = this.deps;
    const intervalMs = config.interval * 1000;
    const pollMs = config.pollInterval * 1000;
    this.running = true;

    while (this.running) {
      const cycleStart = this.now();
      surface.resize();
      this.refresh();
      this.render();

      while (this.running) {
        const remaining = intervalMs - (this.now() - cycleStart);
        if (remaining <= 0) break;

        const key = await input.next(Math.min(pollMs, remaining));
        if (this.resizePending) {
          this.resizePending = false;
          surface.resize();
          this.render();
        }
        if (!key) continue;

        const outcome = this.handleKey(key);
        if (outcome === 'quit') {
          this.running = false;
        } else if (outcome === 'refresh') {
          break;
        } else if (outcome === 'render') {
          this.render();
        }
      }
    }

    logger.info('quit requested');
    return 0;
  }

  private translateLine(instructions: Instruction[]): RenderedSpan[] {
    const source = this.colorExhausted ? withoutColor(instructions) : instructions;
    try {
      return Array.from(this.translator.translate(source));
    } catch (error) {
      if (!(error instanceof ColorPairCapacityError)) throw error;
      logger.warn(`${error.message}; showing further output without color`);
      this.colorExhausted = true;
      return Array.from(this.translator.translate(withoutColor(instructions)));
    }
  }
}
