/**
 * Public API for @notiqd/engine.
 *
 * Re-exports the modules needed by the CLI package and external consumers.
 */

export { Daemon, type DaemonOptions, type DisplayView, type RenderFn } from './daemon.js';
export {
  NotificationQueues,
  DEFAULT_HISTORY_LENGTH,
  DEFAULT_HISTORY_REASONS,
  type CloseEvent,
  type CloseHandler,
  type QueuesOptions,
} from './queues.js';
export {
  CLOSE_REASONS,
  FULLSCREEN_BEHAVIOURS,
  URGENCIES,
  type CloseReason,
  type FullscreenBehaviour,
  type Notification,
  type NotificationInput,
  type Urgency,
} from './notification.js';
export {
  DEFAULT_SHOW_AGE_THRESHOLD,
  DEFAULT_TIMEOUTS,
  formatAge,
  type UrgencyTimeouts,
} from './timeout.js';
export {
  formatCommand,
  parseCommand,
  InboxCommandSchema,
  type InboxCommand,
  type InboxCommandInput,
} from './commands.js';
export { DEFAULT_INBOX_DIR, INBOX_FILE_NAME } from './inbox-watcher.js';
export type { Logger } from './logger.js';
