import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Daemon, type DaemonOptions, type DisplayView } from './daemon.js';
import type { CloseEvent } from './queues.js';
import type { Logger } from './logger.js';

const silentLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

function notifyLine(summary: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    method: 'notify',
    params: { appName: 'test-app', summary, ...extra },
  });
}

describe('Daemon', () => {
  let views: DisplayView[];
  let closed: CloseEvent[];
  let daemon: Daemon | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    views = [];
    closed = [];
  });

  afterEach(async () => {
    await daemon?.stop();
    daemon = undefined;
    vi.useRealTimers();
  });

  function createDaemon(options: Partial<DaemonOptions> = {}): Daemon {
    const created = new Daemon({
      logger: silentLogger,
      // Never started: tests feed lines through handleLines directly
      inbox: { inboxDir: '/tmp/notiqd-test-nonexistent' },
      onDisplay: view => views.push(view),
      onClose: event => closed.push(event),
      now: () => Date.now(),
      ...options,
    });
    daemon = created;
    return created;
  }

  const lastView = (): DisplayView | undefined => views[views.length - 1];
  const displayedSummaries = (): string[] =>
    (lastView()?.displayed ?? []).map(n => n.summary);

  describe('wake-up', () => {
    it('displays and renders a notification after a batch of lines', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('hello')]);

      expect(views).toHaveLength(1);
      expect(displayedSummaries()).toEqual(['hello']);
      expect(lastView()?.waiting).toBe(0);
      expect(lastView()?.paused).toBe(false);
    });

    it('renders once per batch', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('a'), notifyLine('b')]);

      expect(views).toHaveLength(1);
      expect(displayedSummaries()).toEqual(['a', 'b']);
    });

    it('does not render when every line is invalid', () => {
      const warnings: string[] = [];
      const d = createDaemon({
        logger: { ...silentLogger, warn: msg => warnings.push(msg) },
      });
      d.handleLines(['not json', '{"method":"explode"}']);

      expect(views).toEqual([]);
      expect(warnings).toEqual([
        'Skipping inbox line that is not JSON: not json',
        'Skipping inbox line with unknown method: {"method":"explode"}',
      ]);
    });
  });

  describe('timeouts', () => {
    it('expires a notification once its timeout has fully passed', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('short', { timeoutMs: 5000 })]);

      vi.advanceTimersByTime(5000);
      expect(closed).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(closed.map(e => [e.id, e.reason])).toEqual([[1, 'expired']]);
      expect(displayedSummaries()).toEqual([]);
      expect(lastView()?.history).toBe(1);
    });

    it('uses the configured urgency timeouts', () => {
      const d = createDaemon({ queues: { timeouts: { low: 2000 } } });
      d.handleLines([notifyLine('quiet', { urgency: 'low' })]);

      vi.advanceTimersByTime(2001);
      expect(closed.map(e => e.reason)).toEqual(['expired']);
    });

    it('waits out a timeout longer than the largest timer delay', () => {
      const d = createDaemon({
        queues: { timeouts: { normal: 3_000_000_000 }, showAgeThreshold: null },
      });
      d.handleLines([notifyLine('long')]);

      vi.advanceTimersByTime(1000);
      expect(views).toHaveLength(1);

      vi.advanceTimersByTime(2_999_998_999);
      expect(closed).toEqual([]);
      expect(views).toHaveLength(2);

      vi.advanceTimersByTime(2);
      expect(closed.map(e => e.reason)).toEqual(['expired']);
    });

    it('never expires a critical notification', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('alarm', { urgency: 'critical' })]);

      vi.advanceTimersByTime(10 * 60 * 1000);
      expect(closed).toEqual([]);
      expect(displayedSummaries()).toEqual(['alarm']);
    });

    it('re-renders when the age label appears and then every second', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('alarm', { urgency: 'critical' })]);
      expect(views).toHaveLength(1);

      vi.advanceTimersByTime(60_000);
      expect(views).toHaveLength(2);

      vi.advanceTimersByTime(1000);
      expect(views).toHaveLength(3);
    });

    it('does not schedule age renders when the age label is disabled', () => {
      const d = createDaemon({ queues: { showAgeThreshold: null } });
      d.handleLines([notifyLine('alarm', { urgency: 'critical' })]);

      vi.advanceTimersByTime(10 * 60 * 1000);
      expect(views).toHaveLength(1);
    });

    it('holds notifications while idle and resumes timing afterwards', () => {
      const d = createDaemon();
      d.handleLines([
        JSON.stringify({ method: 'status', params: { idle: true } }),
        notifyLine('held'),
      ]);
      expect(d.desktopStatus).toEqual({ idle: true, fullscreen: false });

      vi.advanceTimersByTime(30_000);
      expect(closed).toEqual([]);

      d.handleLines([JSON.stringify({ method: 'status', params: { idle: false } })]);
      vi.advanceTimersByTime(10_001);
      expect(closed.map(e => e.reason)).toEqual(['expired']);
    });

    it('keeps timing out transient notifications while idle', () => {
      const d = createDaemon();
      d.handleLines([
        JSON.stringify({ method: 'status', params: { idle: true } }),
        notifyLine('fleeting', { transient: true }),
      ]);

      vi.advanceTimersByTime(10_001);
      expect(closed.map(e => e.reason)).toEqual(['expired']);
    });
  });

  describe('commands', () => {
    it('caps the displayed queue with limit', () => {
      const d = createDaemon();
      d.handleLines([
        JSON.stringify({ method: 'limit', params: { value: 1 } }),
        notifyLine('a'),
        notifyLine('b'),
      ]);

      expect(displayedSummaries()).toEqual(['a']);
      expect(lastView()?.waiting).toBe(1);
    });

    it('promotes the next waiting notification when a displayed one closes', () => {
      const d = createDaemon({ queues: { displayedLimit: 1 } });
      d.handleLines([notifyLine('a'), notifyLine('b')]);
      d.handleLines([JSON.stringify({ method: 'close', params: { id: 1 } })]);

      expect(closed.map(e => [e.id, e.reason])).toEqual([[1, 'signal']]);
      expect(displayedSummaries()).toEqual(['b']);
    });

    it('replaces a displayed notification in place', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('a'), notifyLine('b')]);
      d.handleLines([
        JSON.stringify({ method: 'replace', params: { id: 1, summary: 'a2' } }),
      ]);

      expect(displayedSummaries()).toEqual(['a2', 'b']);
      expect(closed).toEqual([]);
    });

    it('stacks a duplicate onto the displayed notification', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('same')]);
      d.handleLines([notifyLine('same')]);

      expect(lastView()?.displayed.map(n => [n.id, n.repeatCount])).toEqual([[1, 1]]);
    });

    it('closes everything as dismissed with close-all', () => {
      const d = createDaemon();
      d.handleLines([
        notifyLine('a'),
        notifyLine('b'),
        JSON.stringify({ method: 'close-all' }),
      ]);

      expect(closed.map(e => [e.id, e.reason])).toEqual([
        [1, 'dismissed'],
        [2, 'dismissed'],
      ]);
      expect(displayedSummaries()).toEqual([]);
      expect(lastView()?.history).toBe(2);
    });

    it('redisplays the latest history entry without a timeout', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('again')]);
      d.handleLines([JSON.stringify({ method: 'close', params: { id: 1, reason: 'dismissed' } })]);
      d.handleLines([JSON.stringify({ method: 'history-pop' })]);

      expect(displayedSummaries()).toEqual(['again']);
      expect(lastView()?.history).toBe(0);

      vi.advanceTimersByTime(60_000);
      expect(closed).toHaveLength(1);
      expect(displayedSummaries()).toEqual(['again']);
    });

    it('holds new notifications in waiting while paused', () => {
      const d = createDaemon();
      d.handleLines([JSON.stringify({ method: 'pause' }), notifyLine('later')]);

      expect(displayedSummaries()).toEqual([]);
      expect(lastView()?.waiting).toBe(1);
      expect(lastView()?.paused).toBe(true);

      d.handleLines([JSON.stringify({ method: 'resume' })]);
      expect(displayedSummaries()).toEqual(['later']);
      expect(lastView()?.paused).toBe(false);
    });

    it('flips the pause state with toggle-pause', () => {
      const d = createDaemon();
      d.handleLines([JSON.stringify({ method: 'toggle-pause' })]);
      expect(d.queues.pauseStatus()).toBe(true);

      d.handleLines([JSON.stringify({ method: 'toggle-pause' })]);
      expect(d.queues.pauseStatus()).toBe(false);
    });

    it('keeps expiring displayed notifications while paused', () => {
      const d = createDaemon();
      d.handleLines([notifyLine('shown')]);
      d.handleLines([JSON.stringify({ method: 'pause' })]);

      vi.advanceTimersByTime(10_001);
      expect(closed.map(e => e.reason)).toEqual(['expired']);
    });

    it('moves pushback notifications out of the way while fullscreen', () => {
      const d = createDaemon();
      d.handleLines([
        notifyLine('video-safe', { fullscreen: 'show' }),
        notifyLine('chatty', { fullscreen: 'pushback' }),
      ]);
      expect(displayedSummaries()).toEqual(['video-safe', 'chatty']);

      d.handleLines([JSON.stringify({ method: 'status', params: { fullscreen: true } })]);
      expect(displayedSummaries()).toEqual(['video-safe']);
      expect(lastView()?.waiting).toBe(1);

      d.handleLines([JSON.stringify({ method: 'status', params: { fullscreen: false } })]);
      expect(displayedSummaries()).toEqual(['video-safe', 'chatty']);
    });
  });

  describe('stop', () => {
    it('cancels the pending wake-up and empties the queues', async () => {
      const d = createDaemon();
      d.handleLines([notifyLine('a')]);

      await d.stop();
      vi.advanceTimersByTime(20_000);

      expect(closed).toEqual([]);
      expect(views).toHaveLength(1);
      expect(d.queues.lengthDisplayed()).toBe(0);
    });
  });
});
