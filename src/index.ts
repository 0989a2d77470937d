/**
 * viewpane: re-run a command on a timer and page through its colored output.
 */

export * from './render/types.js';
export { ATTR_BITS, ATTR_COLOR, ATTR_NORMAL, attrFlags, attrSlot, encodeAttr, flagsOf, hasFlag } from './render/attr.js';
export {
  ColorPairCapacityError,
  ColorPairRegistry,
  DEFAULT_MAX_COLOR_PAIRS,
  type ColorPairLookup,
  type ColorPairRegistryOptions,
} from './render/color-pair-registry.js';
export { AttributeTranslator, createStyleState, translateInstructions } from './render/attribute-translator.js';
export { ViewportBuffer } from './render/viewport-buffer.js';
export { parseLine, splitOutputLines } from './ansi/line-parser.js';
export { sgrToInstructions } from './ansi/sgr.js';
export type { RenderSurface } from './terminal/surface.js';
export { AnsiSurface, attrToSgr, type TerminalOutput } from './terminal/ansi-surface.js';
export { KeyDecoder, type KeyEvent } from './terminal/key-decoder.js';
export { StreamKeyInput, type KeyInput } from './terminal/key-input.js';
export { DEFAULT_KEYMAP, keyId, lookupAction, type KeyMap, type ViewerAction } from './terminal/keymap.js';
export { TerminalSession, withTerminal } from './terminal/session.js';
export {
  CommandExecutionError,
  CommandFailedError,
  SpawnCommandRunner,
  type CommandResult,
  type CommandRunner,
  type WatchedCommand,
} from './runtime/command-runner.js';
export { WatchController, type WatchControllerDeps } from './runtime/controller.js';
export { DEFAULT_CONFIG, resolveConfig, type ViewerConfig } from './config/index.js';
export { main } from './cli/main.js';
