import { mkdirSync, appendFileSync, statSync, renameSync, existsSync } from 'fs';
import { dirname } from 'path';

type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * The part of the logger the pipeline writes to. Components take this
 * instead of `Logger` so callers can hand in any sink with the same methods.
 */
export type LogSink = Pick<Logger, 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  maxLogSizeMB?: number;
  maxFiles?: number;
  console?: boolean;
}

export class Logger {
  private logFile: string;
  private currentSize: number = 0;
  private maxLogSize: number;
  private maxFiles: number;
  private echo: boolean;

  constructor(logFile: string, options: LoggerOptions = {}) {
    this.logFile = logFile;
    this.maxLogSize = (options.maxLogSizeMB ?? 10) * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.echo = options.console ?? true;
    this.ensureLogDirectory();

    try {
      const stats = statSync(logFile);
      this.currentSize = stats.size;
    } catch {
      this.currentSize = 0;
    }
  }

  private ensureLogDirectory(): void {
    const dir = dirname(this.logFile);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
    return `${timestamp} [${level}] ${message}\n`;
  }

  // log.1 is always the most recent rotation; the oldest falls off the end.
  private rotateLog(): void {
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const rotatedFile = `${this.logFile}.${i}`;
      if (existsSync(rotatedFile)) {
        renameSync(rotatedFile, `${this.logFile}.${i + 1}`);
      }
    }

    renameSync(this.logFile, `${this.logFile}.1`);
    this.currentSize = 0;
  }

  private write(level: LogLevel, message: string): void {
    const logLine = this.formatMessage(level, message);
    appendFileSync(this.logFile, logLine);
    this.currentSize += Buffer.byteLength(logLine);

    if (this.echo) {
      const stream = level === 'ERROR' ? process.stderr : process.stdout;
      stream.write(logLine);
    }

    if (this.currentSize > this.maxLogSize) {
      this.rotateLog();
    }
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string): void {
    this.write('ERROR', message);
  }
}
