/**
 * Command-line entry: parse arguments, take over the terminal, run the
 * watch loop, and always give the terminal back.
 */

import chalk from 'chalk';
import { ConfigError, resolveConfig, type ViewerConfig } from '../config/index.js';
import { closeLogFile, createLogger, openLogFile } from '../infra/logger.js';
import { ColorPairRegistry } from '../render/color-pair-registry.js';
import { SpawnCommandRunner, type CommandRunner, type WatchedCommand } from '../runtime/command-runner.js';
import { WatchController } from '../runtime/controller.js';
import { AnsiSurface } from '../terminal/ansi-surface.js';
import { StreamKeyInput } from '../terminal/key-input.js';
import {
  TerminalSession,
  withTerminal,
  type TerminalInputStream,
  type TerminalOutputStream,
} from '../terminal/session.js';
import { parseCliArgs, USAGE, UsageError } from './args.js';

const logger = createLogger('main');

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export type MainIo = {
  stdin: TerminalInputStream;
  stdout: TerminalOutputStream;
  stderr: { write(chunk: string): unknown };
  env: NodeJS.ProcessEnv;
  runner?: CommandRunner;
};

function defaultIo(): MainIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type Prepared =
  | { kind: 'exit'; code: number }
  | { kind: 'run'; command: WatchedCommand; config: ViewerConfig };

function prepare(argv: string[], io: MainIo): Prepared {
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      io.stdout.write(`${USAGE}\n`);
      return { kind: 'exit', code: EXIT_OK };
    }
    return { kind: 'run', command: parsed.command, config: resolveConfig(parsed.overrides, io.env) };
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigError) {
      io.stderr.write(`${chalk.red(`viewpane: ${error.message}`)}\n\n${USAGE}\n`);
      return { kind: 'exit', code: EXIT_USAGE };
    }
    throw error;
  }
}

export async function main(argv: string[] = process.argv.slice(2), io: MainIo = defaultIo()): Promise<number> {
  const prepared = prepare(argv, io);
  if (prepared.kind === 'exit') return prepared.code;
  const { command, config } = prepared;

  if (config.logFile) openLogFile(config.logFile);
  logger.info('starting');

  const registry = new ColorPairRegistry({ maxPairs: config.maxColorPairs });
  const session = new TerminalSession(io.stdin, io.stdout);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}`);
    session.restore();
    closeLogFile();
    process.exit(signal === 'SIGTERM' ? 143 : 129);
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGHUP', onSignal);

  try {
    return await withTerminal(session, async () => {
      const input = new StreamKeyInput(io.stdin);
      const controller = new WatchController({
        command,
        config,
        runner: io.runner ?? new SpawnCommandRunner({ env: io.env }),
        surface: new AnsiSurface(io.stdout, registry),
        input,
        registry,
      });
      const onResize = () => controller.requestResize();
      io.stdout.on('resize', onResize);
      try {
        return await controller.run();
      } finally {
        io.stdout.off('resize', onResize);
        input.close();
      }
    });
  } catch (error) {
    logger.error(`caught fatal error: ${errorMessage(error)}`);
    io.stderr.write(`${chalk.red(`viewpane: ${errorMessage(error)}`)}\n`);
    return EXIT_FATAL;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGHUP', onSignal);
    logger.info('stopping');
    closeLogFile();
  }
}
