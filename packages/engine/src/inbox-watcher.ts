import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import type { Logger } from './logger.js';

/**
 * Callback interface for receiving inbox lines.
 */
export interface InboxCallbacks {
  /** Called when new complete lines are appended to an inbox file. */
  onLines: (lines: string[], filePath: string) => void;
  /** Called when an error occurs during watching or reading. */
  onError?: (error: Error) => void;
}

export interface InboxWatcherOptions {
  /** Inbox directory to watch. Defaults to DEFAULT_INBOX_DIR. */
  inboxDir?: string;
  /** Logger instance. */
  logger: Logger;
}

/**
 * Default inbox directory, following the XDG Base Directory spec for
 * state files: $XDG_STATE_HOME/notiqd/inbox (default ~/.local/state).
 */
export const DEFAULT_INBOX_DIR = path.join(
  process.env.XDG_STATE_HOME ?? path.join(os.homedir(), '.local', 'state'),
  'notiqd',
  'inbox',
);

/** Inbox file that `notiqd send` and `notiqd ctl` append to. */
export const INBOX_FILE_NAME = 'commands.jsonl';

/**
 * Watches an inbox directory for .jsonl file changes and emits new
 * lines as they are appended (tail logic).
 *
 * - During initial scan, existing file content is skipped: commands
 *   written while no daemon was running are stale.
 * - After ready, new files are read from the beginning.
 * - Only complete lines (terminated by newline) are emitted.
 * - File truncation is detected and position is reset.
 * - Reads run one at a time, in event order, so lines are emitted once
 *   and in file order even when chokidar reports a write twice.
 */
export class InboxWatcher {
  private watcher: FSWatcher | null = null;
  private readonly filePositions = new Map<string, number>();
  private ready = false;
  /** Tail of the read chain; each task handles its own errors. */
  private tasks: Promise<void> = Promise.resolve();
  private readonly logger: Logger;
  private readonly inboxDir: string;
  private readonly callbacks: InboxCallbacks;

  constructor(callbacks: InboxCallbacks, options: InboxWatcherOptions) {
    this.logger = options.logger;
    this.inboxDir = options.inboxDir ?? DEFAULT_INBOX_DIR;
    this.callbacks = callbacks;
  }

  /** The directory being watched. */
  get directory(): string {
    return this.inboxDir;
  }

  /**
   * Start watching the inbox directory, creating it if needed.
   * Resolves when the initial scan is complete.
   */
  async start(): Promise<void> {
    await fs.promises.mkdir(this.inboxDir, { recursive: true });

    this.watcher = chokidar.watch(this.inboxDir, {
      persistent: true,
      ignoreInitial: false,
      depth: 0,
      ignored: (filePath: string, stats?: fs.Stats) => {
        // Don't filter paths we haven't stat'd yet
        if (!stats) return false;
        if (stats.isDirectory()) return false;
        return !filePath.endsWith('.jsonl');
      },
    });

    this.watcher.on('add', (filePath: string) => {
      // Decided now: the queued read may run after 'ready'.
      const existing = !this.ready;
      this.enqueue(async () => this.handleAdd(filePath, existing));
    });
    this.watcher.on('change', (filePath: string) => {
      this.enqueue(async () => this.handleChange(filePath));
    });
    this.watcher.on('error', (error: unknown) => {
      this.callbacks.onError?.(
        error instanceof Error ? error : new Error(String(error)),
      );
    });

    const watcher = this.watcher;
    await new Promise<void>((resolve) => {
      watcher.on('ready', () => {
        this.ready = true;
        resolve();
      });
    });
  }

  /**
   * Stop watching and release resources.
   */
  async close(): Promise<void> {
    await this.watcher?.close();
    this.watcher = null;
    await this.tasks;
    this.filePositions.clear();
    this.ready = false;
  }

  private enqueue(task: () => Promise<void>): void {
    this.tasks = this.tasks.then(task);
  }

  private async handleAdd(filePath: string, existing: boolean): Promise<void> {
    if (!filePath.endsWith('.jsonl')) return;

    try {
      if (existing) {
        this.logger.debug(`skipping existing inbox content: ${filePath}`);
        const stats = await fs.promises.stat(filePath);
        this.filePositions.set(filePath, stats.size);
      }
      else {
        this.logger.debug(`watching new inbox file: ${filePath}`);
        this.filePositions.set(filePath, 0);
        await this.readAndEmitNewLines(filePath);
      }
    }
    catch (error) {
      this.callbacks.onError?.(
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  private async handleChange(filePath: string): Promise<void> {
    if (!filePath.endsWith('.jsonl')) return;

    try {
      await this.readAndEmitNewLines(filePath);
    }
    catch (error) {
      this.callbacks.onError?.(
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  private async readAndEmitNewLines(filePath: string): Promise<void> {
    const lines = await this.readNewLines(filePath);
    if (lines.length > 0) {
      this.callbacks.onLines(lines, filePath);
    }
  }

  /**
   * Read newly appended complete lines from a file,
   * starting from the last known position.
   */
  private async readNewLines(filePath: string): Promise<string[]> {
    const position = this.filePositions.get(filePath) ?? 0;
    const stats = await fs.promises.stat(filePath);

    if (stats.size <= position) {
      if (stats.size < position) {
        // File was truncated — reset position
        this.filePositions.set(filePath, stats.size);
      }
      return [];
    }

    const handle = await fs.promises.open(filePath, 'r');
    try {
      const readSize = stats.size - position;
      const buffer = Buffer.alloc(readSize);
      const { bytesRead } = await handle.read(buffer, 0, readSize, position);
      const text = buffer.toString('utf-8', 0, bytesRead);

      const parts = text.split('\n');
      let completedBytes = bytesRead;

      // A trailing part without newline is still being written; leave it
      // for the next read.
      const lastPart = parts[parts.length - 1];
      if (
        lastPart !== undefined
        && lastPart.length > 0
        && !text.endsWith('\n')
      ) {
        parts.pop();
        completedBytes -= Buffer.byteLength(lastPart, 'utf-8');
      }

      this.filePositions.set(filePath, position + completedBytes);

      return parts.filter(line => line.length > 0);
    }
    finally {
      await handle.close();
    }
  }
}
