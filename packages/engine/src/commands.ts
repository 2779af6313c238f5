/**
 * JSONL command parser for the notification inbox.
 *
 * Each inbox line is one JSON object `{ "method": ..., "params": ... }`.
 * Lines are validated with zod and turned into typed commands for the
 * Daemon. Lines that are not JSON, name an unknown method or fail
 * validation are skipped and reported through `onWarn`.
 */

import { z } from 'zod';
import {
  CLOSE_REASONS,
  FULLSCREEN_BEHAVIOURS,
  URGENCIES,
} from './notification.js';

const IdSchema = z.number().int().positive();

const NotificationParamsSchema = z.object({
  appName: z.string().default(''),
  summary: z.string(),
  body: z.string().default(''),
  urgency: z.enum(URGENCIES).optional(),
  transient: z.boolean().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
  progress: z.number().int().min(0).max(100).optional(),
  fullscreen: z.enum(FULLSCREEN_BEHAVIOURS).optional(),
  historyIgnore: z.boolean().optional(),
});

const NotifyCommandSchema = z.object({
  method: z.literal('notify'),
  params: NotificationParamsSchema.extend({
    id: z.number().int().nonnegative().optional(),
  }),
});

const ReplaceCommandSchema = z.object({
  method: z.literal('replace'),
  params: NotificationParamsSchema.extend({ id: IdSchema }),
});

const CloseCommandSchema = z.object({
  method: z.literal('close'),
  params: z.object({
    id: IdSchema,
    reason: z.enum(CLOSE_REASONS).default('signal'),
  }),
});

const StatusCommandSchema = z.object({
  method: z.literal('status'),
  params: z.object({
    idle: z.boolean().optional(),
    fullscreen: z.boolean().optional(),
  }),
});

const LimitCommandSchema = z.object({
  method: z.literal('limit'),
  params: z.object({ value: z.number().int().nonnegative() }),
});

const CloseAllCommandSchema = z.object({ method: z.literal('close-all') });
const HistoryPopCommandSchema = z.object({ method: z.literal('history-pop') });
const PauseCommandSchema = z.object({ method: z.literal('pause') });
const ResumeCommandSchema = z.object({ method: z.literal('resume') });
const TogglePauseCommandSchema = z.object({ method: z.literal('toggle-pause') });

/** Every command an inbox line can carry. */
export const InboxCommandSchema = z.discriminatedUnion('method', [
  NotifyCommandSchema,
  ReplaceCommandSchema,
  CloseCommandSchema,
  CloseAllCommandSchema,
  HistoryPopCommandSchema,
  PauseCommandSchema,
  ResumeCommandSchema,
  TogglePauseCommandSchema,
  StatusCommandSchema,
  LimitCommandSchema,
]);

/** Schema for a raw JSON object's `method` field, used for dispatch. */
const MethodSchema = z.object({
  method: z.enum([
    'notify',
    'replace',
    'close',
    'close-all',
    'history-pop',
    'pause',
    'resume',
    'toggle-pause',
    'status',
    'limit',
  ]),
});

export type InboxCommand = z.infer<typeof InboxCommandSchema>;

/** Command shape accepted by `formatCommand`, before defaults are applied. */
export type InboxCommandInput = z.input<typeof InboxCommandSchema>;

export interface ParseOptions {
  /** Called for every skipped line. */
  onWarn?: (message: string) => void;
}

/**
 * Parse a single inbox line into a command.
 * Returns null if the line is invalid JSON, names an unknown method,
 * or fails validation.
 */
export function parseCommand(
  line: string,
  options?: ParseOptions,
): InboxCommand | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  }
  catch {
    options?.onWarn?.(`Skipping inbox line that is not JSON: ${line}`);
    return null;
  }

  const methodResult = MethodSchema.safeParse(parsed);
  if (!methodResult.success) {
    options?.onWarn?.(`Skipping inbox line with unknown method: ${line}`);
    return null;
  }

  const result = InboxCommandSchema.safeParse(parsed);
  if (!result.success) {
    options?.onWarn?.(
      `Failed to validate ${methodResult.data.method} command: ${result.error.message}`,
    );
    return null;
  }
  return result.data;
}

/** Parse multiple inbox lines, dropping the ones that fail. */
export function processLines(
  lines: string[],
  options?: ParseOptions,
): InboxCommand[] {
  const commands: InboxCommand[] = [];
  for (const line of lines) {
    const command = parseCommand(line, options);
    if (command !== null) {
      commands.push(command);
    }
  }
  return commands;
}

/**
 * Validate a command and serialize it as one inbox line (with trailing
 * newline). Throws when the command is invalid.
 */
export function formatCommand(command: InboxCommandInput): string {
  const result = InboxCommandSchema.safeParse(command);
  if (!result.success) {
    throw new Error(`Invalid inbox command: ${result.error.message}`);
  }
  return `${JSON.stringify(result.data)}\n`;
}
