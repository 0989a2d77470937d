import {
  ConfigError,
  parseInterval,
  parseMaxColorPairs,
  parsePollInterval,
  type ConfigOverrides,
} from '../config/index.js';
import type { WatchedCommand } from '../runtime/command-runner.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ParsedCliArgs =
  | { help: true }
  | { help: false; command: WatchedCommand; overrides: ConfigOverrides };

export const USAGE = `Usage: viewpane [options] <command> [args...]
       viewpane [options] -c "<command string>"

Run a command every few seconds and show its colored output in a
scrollable view.

Options:
  -n, --interval <seconds>   time between runs (default 2; alias -d, --delay)
  -c, --command <string>     command string run through the shell
  -s, --status               show the status line (command, exit status, position)
  -e, --errexit              stop when the command exits non-zero
      --poll <seconds>       key polling granularity (default 0.05)
      --max-color-pairs <n>  color pairs the terminal supports (default 256)
      --log-file <path>      append debug logs to <path>
  -h, --help                 show this help

Keys: q quit, arrows/hjkl scroll, space/b page, C-d/C-u half page,
      g/G top/bottom, 0/$ left/right edge, r run now.`;

const VALUE_FLAGS = new Set([
  '-n', '--interval', '-d', '--delay', '-c', '--command', '--poll', '--max-color-pairs', '--log-file',
]);

/**
 * Parse argv (without the node and script entries). Options come first;
 * the first non-option token and everything after it is the command.
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const overrides: ConfigOverrides = {};
  let commandString: string | undefined;
  let tokens: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const part = argv[i];

    if (part === '--') {
      tokens = argv.slice(i + 1);
      break;
    }
    if (!part.startsWith('-') || part === '-') {
      tokens = argv.slice(i);
      break;
    }

    const eqIndex = part.startsWith('--') ? part.indexOf('=') : -1;
    const flag = eqIndex >= 0 ? part.slice(0, eqIndex) : part;
    const inlineValue = eqIndex >= 0 ? part.slice(eqIndex + 1) : undefined;

    const readValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined) throw new UsageError(`${flag} needs a value`);
      i += 1;
      return next;
    };

    if (!VALUE_FLAGS.has(flag) && inlineValue !== undefined) {
      throw new UsageError(`${flag} does not take a value`);
    }

    try {
      switch (flag) {
        case '-h':
        case '--help':
          return { help: true };
        case '-n':
        case '--interval':
        case '-d':
        case '--delay':
          overrides.interval = parseInterval(readValue(), flag);
          break;
        case '--poll':
          overrides.pollInterval = parsePollInterval(readValue(), flag);
          break;
        case '--max-color-pairs':
          overrides.maxColorPairs = parseMaxColorPairs(readValue(), flag);
          break;
        case '-c':
        case '--command':
          commandString = readValue();
          break;
        case '-s':
        case '--status':
          overrides.showStatus = true;
          break;
        case '-e':
        case '--errexit':
          overrides.errexit = true;
          break;
        case '--log-file':
          overrides.logFile = readValue();
          break;
        default:
          throw new UsageError(`Unknown option: ${flag}`);
      }
    } catch (error) {
      if (error instanceof ConfigError) throw new UsageError(error.message);
      throw error;
    }
  }

  if (commandString !== undefined && tokens.length > 0) {
    throw new UsageError('Give the command either as arguments or with --command, not both');
  }
  if (commandString !== undefined) {
    if (commandString.trim() === '') throw new UsageError('--command needs a non-empty command string');
    return { help: false, command: commandString, overrides };
  }
  if (tokens.length === 0) {
    throw new UsageError('No command to watch');
  }
  return { help: false, command: tokens, overrides };
}
