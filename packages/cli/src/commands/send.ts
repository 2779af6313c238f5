/**
 * send subcommand — queue a notification with the running daemon.
 *
 * Appends a `notify` line to the inbox file. With `--id`, the daemon
 * replaces the live notification with that id instead of queueing a new
 * one.
 */

import { parseArgs } from 'node:util';
import {
  FULLSCREEN_BEHAVIOURS,
  URGENCIES,
  type FullscreenBehaviour,
  type Urgency,
} from '@notiqd/engine';
import { loadConfig, resolveInboxDir } from '../config.js';
import { appendCommand, parseIntegerFlag } from './inbox.js';
import { CliError, println } from './output.js';

const USAGE = `\
Usage: notiqd send --summary <text> [options]

Queue a notification with the running daemon.

Options:
  --summary, -s <text>   Notification summary (required)
  --body, -b <text>      Notification body
  --app, -a <name>       Application name
  --urgency, -u <level>  low | normal | critical (default: normal)
  --timeout <ms>         Timeout in ms; 0 = never expire
  --progress <0-100>     Progress value
  --id <n>               Replace the notification with this id
  --transient            Keep timing out while the user is idle
  --fullscreen <mode>    show | delay | pushback
  --no-history           Do not keep in history once closed
  --inbox <dir>          Inbox directory
  --config <path>        Path to config file
  --help, -h             Show this help message`;

function parseUrgency(value: string | undefined): Urgency | undefined {
  if (value === undefined) return undefined;
  const urgency = URGENCIES.find(u => u === value);
  if (urgency === undefined) {
    throw new CliError(`Invalid urgency: ${value} (expected ${URGENCIES.join(', ')})`);
  }
  return urgency;
}

function parseFullscreen(value: string | undefined): FullscreenBehaviour | undefined {
  if (value === undefined) return undefined;
  const behaviour = FULLSCREEN_BEHAVIOURS.find(b => b === value);
  if (behaviour === undefined) {
    throw new CliError(
      `Invalid fullscreen mode: ${value} (expected ${FULLSCREEN_BEHAVIOURS.join(', ')})`,
    );
  }
  return behaviour;
}

export async function runSendCommand(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      'summary': { type: 'string', short: 's' },
      'body': { type: 'string', short: 'b' },
      'app': { type: 'string', short: 'a' },
      'urgency': { type: 'string', short: 'u' },
      'timeout': { type: 'string' },
      'progress': { type: 'string' },
      'id': { type: 'string' },
      'transient': { type: 'boolean' },
      'fullscreen': { type: 'string' },
      'no-history': { type: 'boolean' },
      'inbox': { type: 'string' },
      'config': { type: 'string' },
      'help': { type: 'boolean', short: 'h' },
    },
  });

  if (values.help === true) {
    println(USAGE);
    return;
  }

  if (values.summary === undefined) {
    throw new CliError(`--summary is required\n\n${USAGE}`);
  }

  const config = await loadConfig(values.config);
  const inboxDir = resolveInboxDir(config, values.inbox);

  await appendCommand(inboxDir, {
    method: 'notify',
    params: {
      id: parseIntegerFlag('--id', values.id),
      appName: values.app,
      summary: values.summary,
      body: values.body,
      urgency: parseUrgency(values.urgency),
      timeoutMs: parseIntegerFlag('--timeout', values.timeout),
      progress: parseIntegerFlag('--progress', values.progress),
      transient: values.transient,
      fullscreen: parseFullscreen(values.fullscreen),
      historyIgnore: values['no-history'],
    },
  });
}
