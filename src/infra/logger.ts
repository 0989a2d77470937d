/**
 * Tagged logging for the viewer.
 *
 * The terminal belongs to the viewport while it runs, so nothing is logged
 * until a log file is configured. Lines look like
 * `<iso time> <LEVEL> [tag] message`.
 */

import { Console } from 'console';
import { createWriteStream, type WriteStream } from 'fs';
import { homedir } from 'os';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let sink: Console | null = null;
let sinkStream: WriteStream | null = null;
let minLevel: LogLevel = 'debug';

const homeDir = homedir();

/** Replace the user's home directory with `~` so log lines stay portable. */
export function sanitizePath(text: string): string {
  if (!homeDir) return text;
  return text.replaceAll(homeDir, '~');
}

export function truncateContent(text: string, maxLen = 80): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

/**
 * Route all loggers to `console`-style output on the given stream.
 * Passing `null` turns logging off again.
 */
export function setLogSink(stream: NodeJS.WritableStream | null, level: LogLevel = 'debug'): void {
  sink = stream ? new Console({ stdout: stream, stderr: stream }) : null;
  minLevel = level;
}

export function openLogFile(path: string, level: LogLevel = 'debug'): void {
  closeLogFile();
  sinkStream = createWriteStream(path, { flags: 'a' });
  setLogSink(sinkStream, level);
}

export function closeLogFile(): void {
  if (sinkStream) {
    sinkStream.end();
    sinkStream = null;
  }
  sink = null;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (!sink || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${tag}] ${sanitizePath(message)}`;
    if (level === 'error') sink.error(line, ...args);
    else if (level === 'warn') sink.warn(line, ...args);
    else sink.log(line, ...args);
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
