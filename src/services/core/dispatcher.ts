import { copyFile, mkdir, rename, rm, stat, unlink, utimes } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { SorterConfig } from '../config';
import type { ArchiveResult } from '../../utils/archive';
import type { LogSink } from '../../utils/logger';
import { resolveUniquePath } from '../../utils/pathNaming';
import { classify } from './router';

export type MoveOutcome =
  | { status: 'moved'; destination: string; archived: boolean }
  | { status: 'skipped'; reason: 'unsupported' }
  | { status: 'failed'; error: string };

export interface Archiver {
  archive(filePath: string): Promise<ArchiveResult>;
}

export interface DispatcherOptions {
  baseDirectory: string;
  config: SorterConfig;
  archive: Archiver;
  logger: LogSink;
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

export class Dispatcher {
  private baseDirectory: string;
  private config: SorterConfig;
  private archiveService: Archiver;
  private logger: LogSink;

  constructor(options: DispatcherOptions) {
    this.baseDirectory = options.baseDirectory;
    this.config = options.config;
    this.archiveService = options.archive;
    this.logger = options.logger;
  }

  /**
   * Sorts one file into `<sorted>/<category>/` and archives the moved copy.
   * Never throws: every outcome is logged and returned.
   */
  async dispatch(sourcePath: string): Promise<MoveOutcome> {
    const ext = extname(sourcePath).toLowerCase();
    const category = classify(ext, this.config.extensionMap);

    if (category === null) {
      this.logger.warn(`Unknown / unsupported file type: ${sourcePath}`);
      return { status: 'skipped', reason: 'unsupported' };
    }

    const destDir = join(this.baseDirectory, this.config.sortedDirectory, category);

    let finalDest: string;
    try {
      await mkdir(destDir, { recursive: true });
      finalDest = resolveUniquePath(destDir, basename(sourcePath));
      await this.moveFile(sourcePath, finalDest);
      this.logger.info(`Moved ${sourcePath} to ${finalDest}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error moving ${sourcePath}: ${message}`);
      return { status: 'failed', error: message };
    }

    const archiveResult = await this.archiveService.archive(finalDest);
    return { status: 'moved', destination: finalDest, archived: archiveResult.success };
  }

  private async moveFile(sourcePath: string, destPath: string): Promise<void> {
    try {
      await rename(sourcePath, destPath);
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw error;
      }

      // rename cannot cross filesystems
      const stats = await stat(sourcePath);
      await copyFile(sourcePath, destPath);
      await utimes(destPath, stats.atime, stats.mtime);
      try {
        await unlink(sourcePath);
      } catch (unlinkError) {
        // leave the file where it was rather than in two places
        await rm(destPath, { force: true });
        throw unlinkError;
      }
    }
  }
}
