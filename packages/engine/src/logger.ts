/**
 * Sink for the queue engine's diagnostics. Queues, the inbox watcher and
 * the daemon all take one as an option; the CLI supplies the stderr one.
 */

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
