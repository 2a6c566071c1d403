import { copyFile, mkdir, stat, utimes } from 'fs/promises';
import { basename, join } from 'path';
import type { LogSink } from './logger';

export interface ArchiveResult {
  success: boolean;
  archivePath?: string;
  error?: string;
}

export function datePartition(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Keeps a dated backup copy of sorted files under `<archiveDir>/<YYYY-MM-DD>/`.
 *
 * Archiving is best-effort: a failed copy is logged and reported in the
 * result, never thrown and never retried. Files archived twice on the same
 * day under the same name overwrite the earlier copy.
 */
export class ArchiveService {
  private archiveDir: string;
  private logger: LogSink;

  constructor(archiveDir: string, logger: LogSink) {
    this.archiveDir = archiveDir;
    this.logger = logger;
  }

  async archive(filePath: string): Promise<ArchiveResult> {
    const targetDir = join(this.archiveDir, datePartition(new Date()));
    const archivePath = join(targetDir, basename(filePath));

    try {
      await mkdir(targetDir, { recursive: true });
      await copyFile(filePath, archivePath);

      const stats = await stat(filePath);
      await utimes(archivePath, stats.atime, stats.mtime);

      this.logger.info(`Archived ${filePath} to ${targetDir}`);
      return { success: true, archivePath };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error archiving ${filePath}: ${message}`);
      return { success: false, error: message };
    }
  }
}
