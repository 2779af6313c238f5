/**
 * Queue engine: owns every notification from arrival to dismissal.
 *
 * Notifications live in exactly one of three insertion-ordered queues:
 *
 *   waiting   accepted, not yet shown
 *   displayed shown, bounded by the displayed limit
 *   history   closed, kept for redisplay (tail = most recent)
 *
 * All operations are synchronous and leave the queues consistent when
 * they return. Constructing an instance is the init step; `teardown()`
 * releases everything. Nothing here touches the display: after any
 * mutation the caller runs its own wake-up (see Daemon).
 */

import {
  CLOSE_REASONS,
  adopt,
  createNotification,
  isDuplicate,
  snapshot,
  type CloseReason,
  type FullscreenBehaviour,
  type Notification,
  type NotificationInput,
  type Urgency,
} from './notification.js';
import {
  DEFAULT_SHOW_AGE_THRESHOLD,
  DEFAULT_TIMEOUTS,
  evaluateTimeout,
  nextAgeChange,
  remainingTime,
  type UrgencyTimeouts,
} from './timeout.js';
import type { Logger } from './logger.js';

/** Close event forwarded to the transport. */
export interface CloseEvent {
  id: number;
  reason: CloseReason;
  notification: Readonly<Notification>;
}

export type CloseHandler = (event: CloseEvent) => void;

/** Reasons that keep a closed notification in history by default. */
export const DEFAULT_HISTORY_REASONS: readonly CloseReason[] = CLOSE_REASONS.filter(
  reason => reason !== 'replaced',
);

/** Default maximum history size. */
export const DEFAULT_HISTORY_LENGTH = 20;

export interface QueuesOptions {
  /** Logger instance. */
  logger: Logger;
  /** Receives exactly one event per closed notification. */
  onClose: CloseHandler;
  /** Maximum displayed notifications; 0 = unlimited (default: 0). */
  displayedLimit?: number;
  /**
   * Leave one displayed slot free for a "N more" indicator when the
   * queues hold more than the limit (default: false).
   */
  indicateHidden?: boolean;
  /** Merge semantic duplicates instead of queueing them (default: true). */
  stackDuplicates?: boolean;
  /** Per-urgency timeouts in ms (default: 10s / 10s / never). */
  timeouts?: Partial<UrgencyTimeouts>;
  /** Per-urgency fullscreen behaviour for inputs that name none (default: "show"). */
  fullscreen?: Partial<Record<Urgency, FullscreenBehaviour>>;
  /** Age in ms at which the age label appears; null disables (default: 60000). */
  showAgeThreshold?: number | null;
  /** Maximum history entries, oldest dropped first; 0 = unbounded (default: 20). */
  historyLength?: number;
  /** Redisplayed history entries never time out (default: true). */
  stickyHistory?: boolean;
  /** Close reasons that push to history (default: all but "replaced"). */
  historyReasons?: readonly CloseReason[];
  /** Monotonic clock in ms (default: performance.now). */
  now?: () => number;
}

export class NotificationQueues {
  private readonly waiting: Notification[] = [];
  private readonly displayed: Notification[] = [];
  private readonly history: Notification[] = [];
  /** Ids redisplayed from history under sticky history; they never time out. */
  private readonly sticky = new Set<number>();

  private readonly logger: Logger;
  private readonly onClose: CloseHandler;
  private readonly now: () => number;
  private readonly indicateHidden: boolean;
  private readonly stackDuplicates: boolean;
  private readonly timeouts: UrgencyTimeouts;
  private readonly fullscreenDefaults: Record<Urgency, FullscreenBehaviour>;
  private readonly showAgeThreshold: number | null;
  private readonly historyLength: number;
  private readonly stickyHistory: boolean;
  private readonly historyReasons: ReadonlySet<CloseReason>;

  private displayedLimit: number;
  private paused = false;
  /** Highest id handed out or seen; fresh ids are always above it. */
  private lastId = 0;

  constructor(options: QueuesOptions) {
    this.logger = options.logger;
    this.onClose = options.onClose;
    this.now = options.now ?? (() => performance.now());
    this.displayedLimit = options.displayedLimit ?? 0;
    this.indicateHidden = options.indicateHidden ?? false;
    this.stackDuplicates = options.stackDuplicates ?? true;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.fullscreenDefaults = {
      low: 'show',
      normal: 'show',
      critical: 'show',
      ...options.fullscreen,
    };
    this.showAgeThreshold
      = options.showAgeThreshold === undefined
        ? DEFAULT_SHOW_AGE_THRESHOLD
        : options.showAgeThreshold;
    this.historyLength = options.historyLength ?? DEFAULT_HISTORY_LENGTH;
    this.stickyHistory = options.stickyHistory ?? true;
    this.historyReasons = new Set(
      options.historyReasons ?? DEFAULT_HISTORY_REASONS,
    );
  }

  /** Set the cap applied by the next `update`. Never evicts. */
  setDisplayedLimit(limit: number): void {
    this.displayedLimit = Math.max(0, Math.floor(limit));
  }

  /** Immutable snapshot of the displayed queue, in display order. */
  getDisplayed(): ReadonlyArray<Readonly<Notification>> {
    return this.displayed.map(snapshot);
  }

  /** Immutable snapshot of the waiting queue, front first. */
  getWaiting(): ReadonlyArray<Readonly<Notification>> {
    return this.waiting.map(snapshot);
  }

  /** Immutable snapshot of history, oldest first. */
  getHistory(): ReadonlyArray<Readonly<Notification>> {
    return this.history.map(snapshot);
  }

  lengthWaiting(): number {
    return this.waiting.length;
  }

  lengthDisplayed(): number {
    return this.displayed.length;
  }

  lengthHistory(): number {
    return this.history.length;
  }

  /**
   * Insert a notification.
   *
   * - id 0: stacked onto a queued duplicate (returns 0), or assigned a
   *   fresh id and appended to waiting (returns the id).
   * - id != 0: replaces the live notification with that id in place, or
   *   is appended to waiting under that id. Returns the id.
   */
  insert(input: NotificationInput): number {
    const now = this.now();
    const n = createNotification(
      input,
      now,
      this.fullscreenDefaults[input.urgency ?? 'normal'],
    );

    if (n.id === 0) {
      if (this.stackDuplicates && this.stackDuplicate(n, now)) {
        return 0;
      }
      this.lastId += 1;
      n.id = this.lastId;
      this.waiting.push(n);
      this.logger.debug(`queued #${n.id} from ${n.appName}`);
      return n.id;
    }

    if (!this.replaceInPlace(n, now)) {
      // Unknown id: keep it, and make sure fresh ids never collide with it.
      if (n.id > this.lastId) this.lastId = n.id;
      this.waiting.push(n);
      this.logger.debug(`queued #${n.id} from ${n.appName} (caller-assigned id)`);
    }
    return n.id;
  }

  /**
   * Replace the live notification whose id matches `input.id`, keeping
   * its queue and position. Returns false, changing nothing, on a miss.
   */
  replaceById(input: NotificationInput): boolean {
    if (input.id === undefined || input.id === 0) return false;
    const now = this.now();
    const n = createNotification(
      input,
      now,
      this.fullscreenDefaults[input.urgency ?? 'normal'],
    );
    return this.replaceInPlace(n, now);
  }

  /**
   * Close the live notification with the given id. Unknown ids are
   * ignored: another path may already have closed it.
   *
   * Call the display wake-up afterwards.
   */
  closeById(id: number, reason: CloseReason): void {
    const n = this.take(id);
    if (n === undefined) {
      this.logger.debug(`close #${id}: not queued`);
      return;
    }
    this.finishClose(n, reason, this.historyReasons.has(reason));
  }

  /** Close a notification previously obtained from this engine. */
  close(n: Readonly<Notification>, reason: CloseReason): void {
    this.closeById(n.id, reason);
  }

  /**
   * Move the most recent history entry back to the end of waiting. Only
   * the close reason is cleared; with sticky history the engine stops
   * timing it out without touching its fields.
   */
  historyPop(): void {
    const n = this.history.pop();
    if (n === undefined) return;

    n.closeReason = null;
    if (this.findLive(n.id) !== undefined) {
      this.lastId += 1;
      n.id = this.lastId;
    }
    if (this.stickyHistory) {
      this.sticky.add(n.id);
    }
    this.waiting.push(n);
    this.logger.debug(`history: redisplaying #${n.id}`);
  }

  /**
   * Append a notification the caller has already removed from waiting
   * and displayed. Returns false, leaving history untouched, when its id
   * is still live.
   */
  historyPush(n: Readonly<Notification>): boolean {
    if (this.findLive(n.id) !== undefined) {
      this.logger.warn(`history push refused: #${n.id} is still queued`);
      return false;
    }
    this.pushToHistory(adopt(n));
    return true;
  }

  /**
   * Move everything in waiting, then displayed, into history as dismissed
   * by the user, whatever the configured history reasons. Each one still
   * gets its close event.
   */
  historyPushAll(): void {
    const all = [...this.waiting, ...this.displayed];
    this.waiting.length = 0;
    this.displayed.length = 0;
    for (const n of all) {
      this.sticky.delete(n.id);
      this.finishClose(n, 'dismissed', true);
    }
  }

  /**
   * Close displayed notifications whose timeout has run out. Runs whether
   * or not the engine is paused.
   */
  checkTimeouts(idle: boolean, fullscreen: boolean): void {
    if (this.displayed.length === 0) return;

    const now = this.now();
    for (const n of [...this.displayed]) {
      const verdict = evaluateTimeout(this.timing(n), this.timeouts, { idle, fullscreen }, now);
      if (verdict === 'hold') {
        n.displayedAt = now;
      }
      else if (verdict === 'expire') {
        this.closeById(n.id, 'expired');
      }
    }
  }

  /**
   * Promote waiting notifications into free displayed slots.
   * Does nothing while paused.
   *
   * While fullscreen, `pushback` notifications go back to the front of
   * waiting and only `show` notifications are promoted.
   *
   * Call the display wake-up afterwards.
   */
  update(fullscreen: boolean): void {
    if (this.paused) return;

    if (fullscreen) {
      const pushedBack = this.displayed.filter(n => n.fullscreen === 'pushback');
      if (pushedBack.length > 0) {
        for (const n of pushedBack) {
          this.displayed.splice(this.displayed.indexOf(n), 1);
          n.displayedAt = null;
        }
        this.waiting.unshift(...pushedBack);
      }
    }

    const limit = this.currentLimit();
    const now = this.now();
    let i = 0;
    while (this.displayed.length < limit && i < this.waiting.length) {
      const n = this.waiting[i];
      if (n === undefined) break;
      if (fullscreen && n.fullscreen !== 'show') {
        i += 1;
        continue;
      }
      this.waiting.splice(i, 1);
      n.displayedAt = now;
      this.displayed.push(n);
      this.logger.debug(`displaying #${n.id}`);
    }
  }

  /**
   * Time in ms until the next user-visible change among displayed
   * notifications (a timeout or an age label change), or null when
   * nothing is pending.
   */
  getNextDatachange(time: number): number | null {
    let sleep: number | null = null;
    for (const n of this.displayed) {
      const ttl = remainingTime(this.timing(n), this.timeouts, time);
      if (ttl === 0) return 0;
      sleep = earliest(sleep, ttl);
      sleep = earliest(
        sleep,
        nextAgeChange(time - n.createdAt, this.showAgeThreshold),
      );
    }
    return sleep;
  }

  pauseOn(): void {
    this.paused = true;
  }

  pauseOff(): void {
    this.paused = false;
  }

  togglePause(): void {
    this.paused = !this.paused;
  }

  pauseStatus(): boolean {
    return this.paused;
  }

  /** Release every notification in every queue. */
  teardown(): void {
    this.waiting.length = 0;
    this.displayed.length = 0;
    this.history.length = 0;
    this.sticky.clear();
  }

  private currentLimit(): number {
    if (this.displayedLimit === 0) return Infinity;
    if (
      this.indicateHidden
      && this.displayedLimit > 1
      && this.displayed.length + this.waiting.length > this.displayedLimit
    ) {
      return this.displayedLimit - 1;
    }
    return this.displayedLimit;
  }

  /** Merge `n` into a queued duplicate, if there is one. */
  private stackDuplicate(n: Notification, now: number): boolean {
    const shown = this.displayed.find(q => isDuplicate(q, n));
    const orig = shown ?? this.waiting.find(q => isDuplicate(q, n));
    if (orig === undefined) return false;

    // A changed progress value is an update, not a repeat.
    if (orig.progress === n.progress) {
      orig.repeatCount += 1;
    }
    else {
      orig.progress = n.progress;
    }
    orig.createdAt = now;
    if (shown !== undefined) {
      orig.displayedAt = now;
    }
    this.logger.debug(`stacked duplicate onto #${orig.id} (x${orig.repeatCount + 1})`);
    return true;
  }

  private replaceInPlace(n: Notification, now: number): boolean {
    for (const queue of [this.waiting, this.displayed]) {
      const idx = queue.findIndex(q => q.id === n.id);
      const old = queue[idx];
      if (old === undefined) continue;

      n.repeatCount = old.repeatCount;
      this.sticky.delete(n.id);
      if (queue === this.displayed) {
        n.displayedAt = now;
      }
      queue[idx] = n;
      this.logger.debug(`replaced #${n.id}`);
      return true;
    }
    return false;
  }

  private findLive(id: number): Notification | undefined {
    return this.displayed.find(n => n.id === id)
      ?? this.waiting.find(n => n.id === id);
  }

  /** Remove the live notification with this id from its queue. */
  private take(id: number): Notification | undefined {
    for (const queue of [this.displayed, this.waiting]) {
      const idx = queue.findIndex(n => n.id === id);
      if (idx !== -1) {
        this.sticky.delete(id);
        return queue.splice(idx, 1)[0];
      }
    }
    return undefined;
  }

  /**
   * Record the reason and, when `keep` holds, store the notification in
   * history. The close event goes out last.
   */
  private finishClose(n: Notification, reason: CloseReason, keep: boolean): void {
    n.closeReason = reason;
    this.logger.debug(`closed #${n.id} (${reason})`);
    if (keep) {
      this.pushToHistory(n);
    }
    this.onClose({ id: n.id, reason, notification: snapshot(n) });
  }

  /** Sticky notifications are timed as if their timeout were 0. */
  private timing(n: Notification): Notification {
    return this.sticky.has(n.id) ? { ...n, timeoutOverride: 0 } : n;
  }

  private pushToHistory(n: Notification): void {
    if (n.historyIgnore) {
      this.logger.debug(`history: dropping #${n.id} (history ignored)`);
      return;
    }
    if (this.historyLength > 0 && this.history.length >= this.historyLength) {
      this.history.shift();
    }
    this.history.push(n);
  }
}

function earliest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}
