/**
 * Configuration file loading and merging for notiqd.
 *
 * Supports XDG Base Directory specification for config file placement:
 *   $XDG_CONFIG_HOME/notiqd/config.json
 *   (default: ~/.config/notiqd/config.json)
 *
 * CLI arguments take precedence over config file values.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import {
  CLOSE_REASONS,
  DEFAULT_INBOX_DIR,
  FULLSCREEN_BEHAVIOURS,
  type DaemonOptions,
} from '@notiqd/engine';
import { LOG_LEVELS } from './logger.js';

const TimeoutMsSchema = z.number().int().nonnegative();
const FullscreenSchema = z.enum(FULLSCREEN_BEHAVIOURS);

export const ConfigSchema = z
  .object({
    /** Log level: "debug" | "info" | "warn" | "error" (default: "info"). */
    logLevel: z.enum(LOG_LEVELS).optional(),

    /** Inbox directory (default: $XDG_STATE_HOME/notiqd/inbox). */
    inbox: z.string().min(1).optional(),

    /** Maximum displayed notifications; 0 = unlimited (default: 0). */
    displayedLimit: z.number().int().nonnegative().optional(),

    /** Reserve a displayed slot for the "(N more)" line (default: false). */
    indicateHidden: z.boolean().optional(),

    /** Merge duplicates into a repeat counter (default: true). */
    stackDuplicates: z.boolean().optional(),

    /** Age in ms at which the age label appears; -1 disables (default: 60000). */
    showAgeThresholdMs: z.number().int().min(-1).optional(),

    /** Per-urgency timeouts in ms; 0 = never expire. */
    timeouts: z
      .object({
        low: TimeoutMsSchema.optional(),
        normal: TimeoutMsSchema.optional(),
        critical: TimeoutMsSchema.optional(),
      })
      .strict()
      .optional(),

    /** Per-urgency behaviour while the desktop is fullscreen (default: "show"). */
    fullscreen: z
      .object({
        low: FullscreenSchema.optional(),
        normal: FullscreenSchema.optional(),
        critical: FullscreenSchema.optional(),
      })
      .strict()
      .optional(),

    /** History options. */
    history: z
      .object({
        /** Maximum entries; 0 = unbounded (default: 20). */
        length: z.number().int().nonnegative().optional(),
        /** Redisplayed entries never time out (default: true). */
        sticky: z.boolean().optional(),
        /** Close reasons kept in history (default: all but "replaced"). */
        reasons: z.array(z.enum(CLOSE_REASONS)).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Return the default config file path following XDG Base Directory spec.
 *
 * Uses $XDG_CONFIG_HOME if set, otherwise falls back to ~/.config.
 */
export function getDefaultConfigPath(): string {
  const xdgConfigHome
    = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'notiqd', 'config.json');
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Load and validate a config file.
 *
 * - If `configPath` is given and the file does not exist, throws an error.
 * - If `configPath` is omitted, uses the XDG default path; missing file
 *   returns an empty config (no error).
 * - JSON parse errors and schema validation errors always throw.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const filePath = configPath ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  }
  catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      if (configPath !== undefined) {
        throw new Error(`Config file not found: ${filePath}`);
      }
      return {};
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  }
  catch {
    throw new Error(`Invalid JSON in config file ${filePath}`);
  }

  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    throw new Error(
      `Invalid config file ${filePath}: ${result.error.message}`,
    );
  }
  return result.data;
}

/** Inbox directory: CLI flag, then config, then the XDG state default. */
export function resolveInboxDir(config: Config, cliInbox?: string): string {
  return cliInbox ?? config.inbox ?? DEFAULT_INBOX_DIR;
}

/**
 * Merge a loaded config with CLI argument overrides into DaemonOptions.
 *
 * Priority: CLI args > config file > defaults (applied downstream).
 */
export function resolveOptions(
  config: Config,
  cliArgs: { inbox?: string; limit?: number },
): Omit<DaemonOptions, 'logger'> {
  const threshold = config.showAgeThresholdMs;

  return {
    inbox: {
      inboxDir: resolveInboxDir(config, cliArgs.inbox),
    },
    queues: {
      displayedLimit: cliArgs.limit ?? config.displayedLimit,
      indicateHidden: config.indicateHidden,
      stackDuplicates: config.stackDuplicates,
      timeouts: config.timeouts,
      fullscreen: config.fullscreen,
      showAgeThreshold: threshold === -1 ? null : threshold,
      historyLength: config.history?.length,
      stickyHistory: config.history?.sticky,
      historyReasons: config.history?.reasons,
    },
  };
}
