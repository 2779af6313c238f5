/**
 * Daemon module — inbox watcher + command parser + queue engine + timer.
 *
 * Watches the inbox directory for appended command lines, applies each
 * command to the queue engine, and after every batch runs the wake-up
 * pass:
 *
 *   1. close displayed notifications whose timeout ran out
 *   2. promote waiting notifications (unless paused)
 *   3. hand the displayed queue to the renderer
 *   4. schedule one timer for the next visible change
 *
 * The timer replaces polling: its delay comes from
 * `NotificationQueues.getNextDatachange`, and firing it runs the same
 * wake-up pass.
 */

import { processLines, type InboxCommand, type ParseOptions } from './commands.js';
import { InboxWatcher, type InboxWatcherOptions } from './inbox-watcher.js';
import {
  NotificationQueues,
  type CloseEvent,
  type CloseHandler,
  type QueuesOptions,
} from './queues.js';
import type { Logger } from './logger.js';
import type { Notification } from './notification.js';
import type { TimeoutContext } from './timeout.js';

/** Shortest timer delay; a notification that is due right now expires on the next tick. */
const MIN_WAKE_DELAY_MS = 1;

/** Longest delay setTimeout accepts; larger values fire after 1 ms. */
const MAX_WAKE_DELAY_MS = 2_147_483_647;

/** What the renderer receives after every wake-up. */
export interface DisplayView {
  displayed: ReadonlyArray<Readonly<Notification>>;
  /** Notifications accepted but not shown. */
  waiting: number;
  history: number;
  paused: boolean;
  /** Clock reading the view was taken at, for age labels. */
  now: number;
}

export type RenderFn = (view: DisplayView) => void;

export interface DaemonOptions {
  /** Logger instance. */
  logger: Logger;
  /** Options forwarded to NotificationQueues (logger, onClose and now are provided by Daemon). */
  queues?: Omit<QueuesOptions, 'logger' | 'onClose' | 'now'>;
  /** Options forwarded to InboxWatcher (logger is provided by Daemon). */
  inbox?: Omit<InboxWatcherOptions, 'logger'>;
  /** Transport: receives one event per closed notification. */
  onClose?: CloseHandler;
  /** Renderer: receives the displayed queue after every wake-up. */
  onDisplay?: RenderFn;
  /** Monotonic clock in ms (default: performance.now). Used for testing. */
  now?: () => number;
}

export class Daemon {
  /** The queue engine. Exposed read-mostly for status output and tests. */
  readonly queues: NotificationQueues;

  private readonly logger: Logger;
  private readonly watcher: InboxWatcher;
  private readonly onClose: CloseHandler | undefined;
  private readonly onDisplay: RenderFn | undefined;
  private readonly now: () => number;
  private readonly parseOptions: ParseOptions;

  private status: TimeoutContext = { idle: false, fullscreen: false };
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(options: DaemonOptions) {
    this.logger = options.logger;
    this.onClose = options.onClose;
    this.onDisplay = options.onDisplay;
    this.now = options.now ?? (() => performance.now());
    this.parseOptions = {
      onWarn: msg => this.logger.warn(msg),
    };

    this.queues = new NotificationQueues({
      ...options.queues,
      logger: this.logger,
      onClose: event => this.handleClose(event),
      now: this.now,
    });

    this.watcher = new InboxWatcher(
      {
        onLines: lines => this.handleLines(lines),
        onError: error => this.handleError(error),
      },
      {
        ...options.inbox,
        logger: this.logger,
      },
    );
  }

  /** Start watching the inbox and render the initial (empty) state. */
  async start(): Promise<void> {
    await this.watcher.start();
    this.logger.info(`watching inbox ${this.watcher.directory}`);
    this.wakeUp();
  }

  /**
   * Stop the daemon: cancel the pending timer, close the watcher and
   * release every notification.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.clearTimer();
    await this.watcher.close();
    this.queues.teardown();
  }

  /** Current idle/fullscreen state used by the wake-up pass. */
  get desktopStatus(): Readonly<TimeoutContext> {
    return this.status;
  }

  /**
   * Handle new inbox lines from the watcher.
   * Visible for testing.
   */
  handleLines(lines: string[]): void {
    const commands = processLines(lines, this.parseOptions);
    for (const command of commands) {
      this.apply(command);
    }
    if (commands.length > 0) {
      this.wakeUp();
    }
  }

  /** Apply one command to the engine. Does not wake up; see `handleLines`. */
  apply(command: InboxCommand): void {
    switch (command.method) {
      case 'notify': {
        const id = this.queues.insert(command.params);
        if (id === 0) {
          this.logger.debug(`notify: stacked "${command.params.summary}" onto a duplicate`);
        }
        else {
          this.logger.info(`notify: #${id} "${command.params.summary}"`);
        }
        break;
      }
      case 'replace':
        if (!this.queues.replaceById(command.params)) {
          this.logger.debug(`replace: #${command.params.id} is not queued`);
        }
        break;
      case 'close':
        this.queues.closeById(command.params.id, command.params.reason);
        break;
      case 'close-all':
        this.queues.historyPushAll();
        break;
      case 'history-pop':
        this.queues.historyPop();
        break;
      case 'pause':
        this.queues.pauseOn();
        this.logger.info('paused');
        break;
      case 'resume':
        this.queues.pauseOff();
        this.logger.info('resumed');
        break;
      case 'toggle-pause':
        this.queues.togglePause();
        this.logger.info(this.queues.pauseStatus() ? 'paused' : 'resumed');
        break;
      case 'status':
        this.status = {
          idle: command.params.idle ?? this.status.idle,
          fullscreen: command.params.fullscreen ?? this.status.fullscreen,
        };
        break;
      case 'limit':
        this.queues.setDisplayedLimit(command.params.value);
        break;
    }
  }

  /**
   * Synchronize queues and display: expire, promote, render, and
   * schedule the next wake-up. No-op after stop().
   */
  wakeUp(): void {
    if (this.stopped) return;
    this.clearTimer();

    const { idle, fullscreen } = this.status;
    this.queues.checkTimeouts(idle, fullscreen);
    this.queues.update(fullscreen);

    const now = this.now();
    this.onDisplay?.({
      displayed: this.queues.getDisplayed(),
      waiting: this.queues.lengthWaiting(),
      history: this.queues.lengthHistory(),
      paused: this.queues.pauseStatus(),
      now,
    });

    const next = this.queues.getNextDatachange(now);
    if (next !== null) {
      const delay = Math.min(Math.max(next, MIN_WAKE_DELAY_MS), MAX_WAKE_DELAY_MS);
      this.timer = setTimeout(() => this.wakeUp(), delay);
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private handleClose(event: CloseEvent): void {
    this.logger.debug(`close: #${event.id} (${event.reason})`);
    this.onClose?.(event);
  }

  private handleError(error: Error): void {
    this.logger.error(error.message);
  }
}
