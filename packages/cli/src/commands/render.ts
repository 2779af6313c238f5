/**
 * Plain-text renderer for `notiqd run`.
 */

import { formatAge, type DisplayView, type Notification } from '@notiqd/engine';

export interface RenderOptions {
  /** Age in ms at which the age label appears; null hides it. */
  showAgeThreshold: number | null;
}

/**
 * One line per notification:
 * `#3 [critical] mail: New mail - 2 unread (x2) [40%] (1m 5s old)`
 */
export function formatNotification(
  n: Readonly<Notification>,
  now: number,
  options: RenderOptions,
): string {
  let line = `#${n.id} [${n.urgency}]`;
  line += n.appName === '' ? ` ${n.summary}` : ` ${n.appName}: ${n.summary}`;
  if (n.body !== '') line += ` - ${n.body}`;
  if (n.repeatCount > 0) line += ` (x${n.repeatCount + 1})`;
  if (n.progress !== null) line += ` [${n.progress}%]`;

  const age = now - n.createdAt;
  if (options.showAgeThreshold !== null && age >= options.showAgeThreshold) {
    line += ` (${formatAge(age)} old)`;
  }
  return line;
}

/** Render the whole display: notifications, then hidden count and pause state. */
export function renderView(view: DisplayView, options: RenderOptions): string {
  const lines = view.displayed.map(n => formatNotification(n, view.now, options));
  if (lines.length === 0) {
    lines.push('(no notifications)');
  }
  if (view.waiting > 0) {
    lines.push(`(${view.waiting} more)`);
  }
  if (view.paused) {
    lines.push('(paused)');
  }
  return lines.join('\n');
}
