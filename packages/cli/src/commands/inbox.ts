/**
 * Shared helpers for the commands that write to the daemon's inbox
 * (`send` and `ctl`).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  INBOX_FILE_NAME,
  formatCommand,
  type InboxCommandInput,
} from '@notiqd/engine';
import { CliError } from './output.js';

/**
 * Validate a command and append it as one JSONL line to the inbox file,
 * creating the directory if needed. Returns the file written to.
 */
export async function appendCommand(
  inboxDir: string,
  command: InboxCommandInput,
): Promise<string> {
  let line: string;
  try {
    line = formatCommand(command);
  }
  catch (err) {
    throw new CliError(err instanceof Error ? err.message : String(err));
  }

  await fs.promises.mkdir(inboxDir, { recursive: true });
  const filePath = path.join(inboxDir, INBOX_FILE_NAME);
  await fs.promises.appendFile(filePath, line, 'utf-8');
  return filePath;
}

/** Parse an integer argument, failing with the argument's name. */
export function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new CliError(`${name} must be an integer: ${value}`);
  }
  return parsed;
}

/** Like parseInteger, for an optional flag. */
export function parseIntegerFlag(
  flag: string,
  value: string | undefined,
): number | undefined {
  return value === undefined ? undefined : parseInteger(flag, value);
}
