/**
 * Timeout evaluation for displayed notifications.
 *
 * Computes effective timeouts, decides what a timeout check does to a
 * single notification, and works out when the next user-visible change
 * (a timeout or a change of the age label) happens, so the daemon can
 * schedule one timer instead of polling.
 */

import type { Notification, Urgency } from './notification.js';

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/** Per-urgency default timeouts in ms. 0 means never expire. */
export type UrgencyTimeouts = Record<Urgency, number>;

export const DEFAULT_TIMEOUTS: UrgencyTimeouts = {
  low: 10 * MS_PER_SECOND,
  normal: 10 * MS_PER_SECOND,
  critical: 0,
};

/** Age at which the "Xs old" label appears (default: one minute). */
export const DEFAULT_SHOW_AGE_THRESHOLD = MS_PER_MINUTE;

/** Desktop state consumed by the timeout check. */
export interface TimeoutContext {
  idle: boolean;
  fullscreen: boolean;
}

/**
 * What a timeout check does with one displayed notification.
 *
 * - `hold`: user is idle; restart the notification's timer
 * - `keep`: still within its timeout (or never expires)
 * - `expire`: close it with reason `expired`
 */
export type TimeoutVerdict = 'hold' | 'keep' | 'expire';

/** Explicit override first, then the urgency default. */
export function effectiveTimeout(
  n: Pick<Notification, 'timeoutOverride' | 'urgency'>,
  timeouts: UrgencyTimeouts,
): number {
  return n.timeoutOverride ?? timeouts[n.urgency];
}

/**
 * Evaluate one displayed notification.
 *
 * Idle only counts when not fullscreen: a fullscreen video keeps the
 * input devices quiet without anyone having walked away. While idle,
 * non-transient notifications are held so they are still there when
 * the user returns; transient ones keep timing out.
 */
export function evaluateTimeout(
  n: Pick<Notification, 'timeoutOverride' | 'urgency' | 'transient' | 'displayedAt'>,
  timeouts: UrgencyTimeouts,
  context: TimeoutContext,
  now: number,
): TimeoutVerdict {
  const idle = context.fullscreen ? false : context.idle;
  if (idle && !n.transient) return 'hold';

  const timeout = effectiveTimeout(n, timeouts);
  if (timeout === 0 || n.displayedAt === null) return 'keep';

  return now - n.displayedAt > timeout ? 'expire' : 'keep';
}

/**
 * Remaining time until `n` times out, or null when it never does.
 * Returns 0 for a notification that is already due.
 */
export function remainingTime(
  n: Pick<Notification, 'timeoutOverride' | 'urgency' | 'displayedAt'>,
  timeouts: UrgencyTimeouts,
  now: number,
): number | null {
  const timeout = effectiveTimeout(n, timeouts);
  if (timeout === 0 || n.displayedAt === null) return null;
  return Math.max(0, timeout - (now - n.displayedAt));
}

/**
 * Time until the rendered age label of a notification of the given age
 * changes, or null when age labels are disabled.
 *
 * Before the threshold nothing is shown, so the next change is the
 * label appearing. Below one hour the label counts seconds; from one
 * hour on it shows hours and minutes, so it only changes on minute
 * boundaries.
 */
export function nextAgeChange(
  age: number,
  showAgeThreshold: number | null,
): number | null {
  if (showAgeThreshold === null) return null;
  if (age < showAgeThreshold) return showAgeThreshold - age;
  if (age < MS_PER_HOUR) return MS_PER_SECOND - (age % MS_PER_SECOND);
  return MS_PER_MINUTE - (age % MS_PER_MINUTE);
}

/** Render an age as "12s", "3m 4s" or "2h 5m". */
export function formatAge(age: number): string {
  const seconds = Math.floor(age / MS_PER_SECOND);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}
