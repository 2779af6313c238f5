/**
 * Notification records and the helpers the queue engine uses to build,
 * compare and hand out copies of them.
 */

export const URGENCIES = ['low', 'normal', 'critical'] as const;

export type Urgency = (typeof URGENCIES)[number];

/**
 * Why a notification left the waiting/displayed queues.
 *
 * - `dismissed`: closed by the user
 * - `signal`: closed by an external close request
 * - `expired`: its timeout ran out
 * - `replaced`: superseded by another notification
 * - `rule`: closed by a filtering rule
 */
export const CLOSE_REASONS = [
  'dismissed',
  'signal',
  'expired',
  'replaced',
  'rule',
] as const;

export type CloseReason = (typeof CLOSE_REASONS)[number];

/**
 * Behaviour of a notification while the desktop is fullscreen.
 *
 * - `show`: displayed as usual
 * - `delay`: stays in waiting until fullscreen ends; already shown ones stay
 * - `pushback`: like `delay`, and already shown ones go back to waiting
 */
export const FULLSCREEN_BEHAVIOURS = ['show', 'delay', 'pushback'] as const;

export type FullscreenBehaviour = (typeof FULLSCREEN_BEHAVIOURS)[number];

/** What a caller hands to the engine. Content is assumed already normalized. */
export interface NotificationInput {
  /** 0 or omitted for a fresh notification; non-zero to replace by id. */
  id?: number;
  appName: string;
  summary: string;
  body: string;
  urgency?: Urgency;
  transient?: boolean;
  /** Explicit timeout in ms; 0 means never expire. */
  timeoutMs?: number;
  /** Progress value (0..100) for progress-bar notifications. */
  progress?: number;
  fullscreen?: FullscreenBehaviour;
  historyIgnore?: boolean;
}

/** Engine-owned notification record. */
export interface Notification {
  id: number;
  appName: string;
  summary: string;
  body: string;
  urgency: Urgency;
  transient: boolean;
  createdAt: number;
  /** Null until first displayed and after a fullscreen pushback; kept in history. */
  displayedAt: number | null;
  timeoutOverride: number | null;
  dedupKey: string;
  repeatCount: number;
  closeReason: CloseReason | null;
  progress: number | null;
  fullscreen: FullscreenBehaviour;
  historyIgnore: boolean;
}

/**
 * Build the duplicate-matching key from origin, summary and body.
 *
 * Fields are JSON-encoded so that a separator inside one field cannot
 * make two different notifications collide.
 */
export function dedupKey(appName: string, summary: string, body: string): string {
  return JSON.stringify([appName, summary, body]);
}

/** Whether `incoming` should be stacked onto `queued`. */
export function isDuplicate(queued: Notification, incoming: Notification): boolean {
  return queued.dedupKey === incoming.dedupKey;
}

/**
 * Create an engine-owned record from caller input.
 *
 * @param defaultFullscreen - behaviour used when the input names none
 */
export function createNotification(
  input: NotificationInput,
  now: number,
  defaultFullscreen: FullscreenBehaviour,
): Notification {
  return {
    id: input.id ?? 0,
    appName: input.appName,
    summary: input.summary,
    body: input.body,
    urgency: input.urgency ?? 'normal',
    transient: input.transient ?? false,
    createdAt: now,
    displayedAt: null,
    timeoutOverride: input.timeoutMs ?? null,
    dedupKey: dedupKey(input.appName, input.summary, input.body),
    repeatCount: 0,
    closeReason: null,
    progress: input.progress ?? null,
    fullscreen: input.fullscreen ?? defaultFullscreen,
    historyIgnore: input.historyIgnore ?? false,
  };
}

/** Frozen copy handed out to callers; never aliases engine state. */
export function snapshot(n: Notification): Readonly<Notification> {
  return Object.freeze({ ...n });
}

/** Mutable copy taken when a caller transfers a notification in. */
export function adopt(n: Readonly<Notification>): Notification {
  return { ...n };
}
