import { watch, type FSWatcher } from 'chokidar';
import { access, readdir } from 'fs/promises';
import { join } from 'path';
import type { WatchMode } from '../config';
import type { LogSink } from '../../utils/logger';

export interface IncomingEvent {
  path: string;
  isDirectory: boolean;
}

export type IncomingEventHandler = (event: IncomingEvent) => Promise<void> | void;

export interface WatchSource {
  readonly running: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Shared lifecycle for watch sources. Subclasses subscribe to some
 * notification mechanism and call `enqueue` for each new entry; events are
 * handed to the handler one at a time, in arrival order, so a slow handler
 * delays later events instead of losing them.
 *
 * `start()` on a running or starting source rejects. `stop()` on a stopped
 * source does nothing; otherwise it resolves once the subscription is closed
 * and the event being handled (if any) has settled. Queued events that have
 * not started yet are dropped.
 */
export abstract class QueuedWatchSource implements WatchSource {
  protected readonly directory: string;
  protected readonly logger: LogSink;
  private readonly onEvent: IncomingEventHandler;
  private isRunning = false;
  private starting: Promise<void> | null = null;
  private stopRequested = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(directory: string, onEvent: IncomingEventHandler, logger: LogSink) {
    this.directory = directory;
    this.onEvent = onEvent;
    this.logger = logger;
  }

  protected abstract subscribe(): Promise<void>;

  protected abstract unsubscribe(): Promise<void>;

  get running(): boolean {
    return this.isRunning;
  }

  async start(): Promise<void> {
    if (this.isRunning || this.starting) {
      throw new Error(`Already watching ${this.directory}`);
    }

    this.stopRequested = false;
    this.starting = this.open();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async open(): Promise<void> {
    try {
      await access(this.directory);
    } catch {
      this.logger.error(`Watch directory not found: ${this.directory}`);
      throw new Error(`Watch directory not found: ${this.directory}`);
    }

    if (this.stopRequested) {
      return;
    }

    this.isRunning = true;
    try {
      await this.subscribe();
    } catch (error) {
      this.isRunning = false;
      await this.unsubscribe();
      throw error;
    }

    // stop() arrived while subscribing and tears the subscription down itself
    if (this.stopRequested) {
      return;
    }

    this.logger.info(`Watching ${this.directory}`);
  }

  /**
   * Also safe to call while `start()` is still pending: the start is allowed
   * to settle and whatever it subscribed is closed before this resolves.
   */
  async stop(): Promise<void> {
    const starting = this.starting;
    if (!this.isRunning && !starting) {
      return;
    }

    this.isRunning = false;
    if (starting) {
      this.stopRequested = true;
      // a failed start is reported to its own caller
      await Promise.allSettled([starting]);
    }

    await this.unsubscribe();
    await this.queue;

    this.logger.info(`Stopped watching ${this.directory}`);
  }

  /** Resolves once every event queued so far has been handled. */
  drain(): Promise<void> {
    return this.queue;
  }

  protected enqueue(event: IncomingEvent): void {
    if (!this.isRunning) {
      return;
    }
    this.queue = this.queue.then(() => this.deliver(event));
  }

  private async deliver(event: IncomingEvent): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    try {
      await this.onEvent(event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to handle ${event.path}: ${message}`);
    }
  }
}

export interface ChokidarWatchOptions {
  // Wait until a file's size has been stable this long before reporting it. 0 disables.
  writeStabilityMs?: number;
}

/** Platform file notifications through chokidar, limited to the top level. */
export class ChokidarWatchSource extends QueuedWatchSource {
  private watcher: FSWatcher | null = null;
  private writeStabilityMs: number;

  constructor(
    directory: string,
    onEvent: IncomingEventHandler,
    logger: LogSink,
    options: ChokidarWatchOptions = {}
  ) {
    super(directory, onEvent, logger);
    this.writeStabilityMs = options.writeStabilityMs ?? 0;
  }

  protected async subscribe(): Promise<void> {
    const watcher = watch(this.directory, {
      depth: 0,
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish:
        this.writeStabilityMs > 0
          ? { stabilityThreshold: this.writeStabilityMs, pollInterval: 100 }
          : false,
    });
    this.watcher = watcher;

    watcher.on('add', (path) => this.enqueue({ path, isDirectory: false }));
    watcher.on('addDir', (path) => {
      if (path !== this.directory) {
        this.enqueue({ path, isDirectory: true });
      }
    });
    watcher.on('error', (error) => {
      this.logger.error(`Watcher error: ${error instanceof Error ? error.message : String(error)}`);
    });

    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
  }

  protected async unsubscribe(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }
}

/**
 * Scans the directory on an interval and reports entries missing from the
 * previous scan. Entries present when watching starts are not reported.
 */
export class PollingWatchSource extends QueuedWatchSource {
  private intervalMs: number;
  private known = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private scanning: Promise<void> = Promise.resolve();

  constructor(directory: string, onEvent: IncomingEventHandler, logger: LogSink, intervalMs: number = 1000) {
    super(directory, onEvent, logger);
    this.intervalMs = intervalMs;
  }

  protected async subscribe(): Promise<void> {
    this.known = new Set(await readdir(this.directory));
    this.timer = setInterval(() => {
      this.scanning = this.scanning.then(() => this.scan());
    }, this.intervalMs);
  }

  protected async unsubscribe(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.scanning;
  }

  private async scan(): Promise<void> {
    if (!this.running) {
      return;
    }

    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      const seen = new Set<string>();

      for (const entry of entries) {
        seen.add(entry.name);
        if (!this.known.has(entry.name)) {
          this.enqueue({ path: join(this.directory, entry.name), isDirectory: entry.isDirectory() });
        }
      }

      this.known = seen;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to scan ${this.directory}: ${message}`);
    }
  }
}

export interface WatchSourceOptions {
  mode: WatchMode;
  pollIntervalMs?: number;
  writeStabilityMs?: number;
}

export function createWatchSource(
  directory: string,
  onEvent: IncomingEventHandler,
  logger: LogSink,
  options: WatchSourceOptions
): QueuedWatchSource {
  if (options.mode === 'polling') {
    return new PollingWatchSource(directory, onEvent, logger, options.pollIntervalMs);
  }
  return new ChokidarWatchSource(directory, onEvent, logger, {
    writeStabilityMs: options.writeStabilityMs,
  });
}
