/**
 * ctl subcommand — control the running daemon.
 *
 * Each action appends one command line to the inbox file.
 */

import { parseArgs } from 'node:util';
import { CLOSE_REASONS, type CloseReason, type InboxCommandInput } from '@notiqd/engine';
import { loadConfig, resolveInboxDir } from '../config.js';
import { appendCommand, parseInteger } from './inbox.js';
import { CliError, println } from './output.js';

const USAGE = `\
Usage: notiqd ctl [options] <action> [argument]

Control the running daemon.

Actions:
  pause                 Stop showing new notifications
  resume                Show notifications again
  toggle                Toggle pause
  close <id>            Close a notification (--reason, default: signal)
  close-all             Dismiss every queued notification into history
  history-pop           Redisplay the most recently closed notification
  limit <n>             Set the displayed limit; 0 = unlimited
  idle <on|off>         Report user idle state
  fullscreen <on|off>   Report fullscreen state

Options:
  --reason <reason>  Close reason for 'close'
  --inbox <dir>      Inbox directory
  --config <path>    Path to config file
  --help, -h         Show this help message`;

function requireArgument(action: string, value: string | undefined): string {
  if (value === undefined) {
    throw new CliError(`ctl ${action} requires an argument\n\n${USAGE}`);
  }
  return value;
}

function parseSwitch(action: string, value: string | undefined): boolean {
  const raw = requireArgument(action, value);
  if (raw === 'on') return true;
  if (raw === 'off') return false;
  throw new CliError(`ctl ${action} expects on or off: ${raw}`);
}

function parseReason(value: string | undefined): CloseReason | undefined {
  if (value === undefined) return undefined;
  const reason = CLOSE_REASONS.find(r => r === value);
  if (reason === undefined) {
    throw new CliError(`Invalid close reason: ${value} (expected ${CLOSE_REASONS.join(', ')})`);
  }
  return reason;
}

/** Translate a ctl action and its argument into an inbox command. */
export function buildControlCommand(
  action: string,
  argument: string | undefined,
  reason?: string,
): InboxCommandInput {
  switch (action) {
    case 'pause':
      return { method: 'pause' };
    case 'resume':
      return { method: 'resume' };
    case 'toggle':
      return { method: 'toggle-pause' };
    case 'close-all':
      return { method: 'close-all' };
    case 'history-pop':
      return { method: 'history-pop' };
    case 'close': {
      const id = parseInteger('id', requireArgument(action, argument));
      return { method: 'close', params: { id, reason: parseReason(reason) } };
    }
    case 'limit': {
      const value = parseInteger('limit', requireArgument(action, argument));
      return { method: 'limit', params: { value } };
    }
    case 'idle':
      return { method: 'status', params: { idle: parseSwitch(action, argument) } };
    case 'fullscreen':
      return { method: 'status', params: { fullscreen: parseSwitch(action, argument) } };
    default:
      throw new CliError(`Unknown ctl action: ${action}\n\n${USAGE}`);
  }
}

export async function runCtlCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      reason: { type: 'string' },
      inbox: { type: 'string' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const action = positionals[0];
  if (values.help === true || action === undefined) {
    println(USAGE);
    return;
  }

  const command = buildControlCommand(action, positionals[1], values.reason);
  const config = await loadConfig(values.config);
  await appendCommand(resolveInboxDir(config, values.inbox), command);
}
