import type { SorterConfig, WatchMode } from '../config';
import { ArchiveService } from '../../utils/archive';
import { type DirectoryLayout, prepareDirectories, resolveLayout } from '../../utils/layout';
import type { LogSink } from '../../utils/logger';
import { Dispatcher } from './dispatcher';
import {
  createWatchSource,
  type IncomingEvent,
  type IncomingEventHandler,
  type WatchSource,
} from './fileWatcher';

export type WatchSourceFactory = (directory: string, onEvent: IncomingEventHandler) => WatchSource;

export interface MonitorOptions {
  watchMode?: WatchMode;
  pollIntervalMs?: number;
  writeStabilityMs?: number;
  createWatchSource?: WatchSourceFactory;
}

export interface MonitorStatus {
  baseDirectory: string | null;
  running: boolean;
}

/**
 * Operator-facing lifecycle: pick a base directory, then start and stop
 * watching its incoming folder.
 */
export class MonitorController {
  private config: SorterConfig;
  private logger: LogSink;
  private options: MonitorOptions;
  private layout: DirectoryLayout | null = null;
  private source: WatchSource | null = null;

  constructor(config: SorterConfig, logger: LogSink, options: MonitorOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.options = options;
  }

  selectDirectory(baseDirectory: string): DirectoryLayout {
    if (this.source) {
      throw new Error('Stop monitoring before selecting another base directory');
    }

    const layout = resolveLayout(baseDirectory, this.config);
    prepareDirectories(layout);
    this.layout = layout;

    this.logger.info(`Base directory selected: ${layout.baseDirectory}`);
    return layout;
  }

  async start(): Promise<void> {
    if (!this.layout) {
      this.logger.warn('No base directory selected. Cannot start monitoring.');
      throw new Error('No base directory selected');
    }
    if (this.source) {
      throw new Error('Monitoring is already running');
    }

    const layout = this.layout;
    const dispatcher = new Dispatcher({
      baseDirectory: layout.baseDirectory,
      config: this.config,
      archive: new ArchiveService(layout.archive, this.logger),
      logger: this.logger,
    });

    const onEvent = async (event: IncomingEvent): Promise<void> => {
      if (event.isDirectory) {
        return;
      }
      this.logger.info(`New file detected: ${event.path}`);
      await dispatcher.dispatch(event.path);
    };

    const source = this.options.createWatchSource
      ? this.options.createWatchSource(layout.incoming, onEvent)
      : createWatchSource(layout.incoming, onEvent, this.logger, {
          mode: this.options.watchMode ?? 'native',
          pollIntervalMs: this.options.pollIntervalMs,
          writeStabilityMs: this.options.writeStabilityMs,
        });

    this.source = source;
    try {
      await source.start();
    } catch (error) {
      if (this.source === source) {
        this.source = null;
      }
      throw error;
    }

    // stopped before the watch source finished starting
    if (this.source !== source) {
      return;
    }
    this.logger.info('Monitoring started');
  }

  async stop(): Promise<void> {
    const source = this.source;
    if (!source) {
      return;
    }

    this.source = null;
    await source.stop();
    this.logger.info('Monitoring stopped');
  }

  getStatus(): MonitorStatus {
    return {
      baseDirectory: this.layout ? this.layout.baseDirectory : null,
      running: this.source !== null && this.source.running,
    };
  }
}
