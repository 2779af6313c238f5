/**
 * run subcommand — starts the notification daemon.
 *
 * Prints the displayed list to stdout whenever it changes, and one
 * `closed <id> <reason>` line per closed notification.
 */

import { parseArgs } from 'node:util';
import {
  DEFAULT_SHOW_AGE_THRESHOLD,
  Daemon,
  type CloseEvent,
  type DisplayView,
} from '@notiqd/engine';
import { loadConfig, resolveOptions } from '../config.js';
import { Logger, resolveLogLevel } from '../logger.js';
import { parseIntegerFlag } from './inbox.js';
import { println } from './output.js';
import { renderView, type RenderOptions } from './render.js';

const USAGE = `\
Usage: notiqd run [options]

Start the notification daemon.

Options:
  --config <path>  Path to config file
  --inbox <dir>    Inbox directory to watch
  --limit <n>      Maximum displayed notifications; 0 = unlimited
  --help, -h       Show this help message`;

/** Prints a view only when its rendered text differs from the last one. */
export function createConsoleRenderer(
  options: RenderOptions,
  write: (text: string) => void = println,
): (view: DisplayView) => void {
  let last: string | undefined;
  return (view) => {
    const text = renderView(view, options);
    if (text === last) return;
    last = text;
    write(`${text}\n`);
  };
}

export function formatCloseEvent(event: CloseEvent): string {
  return `closed ${event.id} ${event.reason}`;
}

export async function runRunCommand(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      inbox: { type: 'string' },
      limit: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help === true) {
    println(USAGE);
    return;
  }

  const config = await loadConfig(values.config);
  const logLevel = resolveLogLevel(config.logLevel);
  const logger = new Logger({ level: logLevel });
  const options = resolveOptions(config, {
    inbox: values.inbox,
    limit: parseIntegerFlag('--limit', values.limit),
  });

  const threshold = options.queues?.showAgeThreshold;
  const daemon = new Daemon({
    ...options,
    logger,
    onDisplay: createConsoleRenderer({
      showAgeThreshold: threshold === undefined ? DEFAULT_SHOW_AGE_THRESHOLD : threshold,
    }),
    onClose: event => println(formatCloseEvent(event)),
  });

  let shuttingDown = false;

  const gracefulShutdown = (): void => {
    if (shuttingDown) {
      logger.info('force shutting down...');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info('shutting down...');
    daemon
      .stop()
      .then(() => {
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error(
          `shutdown error: ${err instanceof Error ? err.message : String(err)}`,
        );
        process.exit(1);
      });
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);

  await daemon.start();
  logger.info('daemon started');
}
