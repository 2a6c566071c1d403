import { mkdirSync } from 'fs';
import { join, resolve } from 'path';
import type { SorterConfig } from '../services/config';
import { categories } from '../services/core/router';

export interface DirectoryLayout {
  baseDirectory: string;
  incoming: string;
  sorted: string;
  archive: string;
  categoryDirs: string[];
}

export function resolveLayout(baseDirectory: string, config: SorterConfig): DirectoryLayout {
  const base = resolve(baseDirectory);
  const sorted = join(base, config.sortedDirectory);

  return {
    baseDirectory: base,
    incoming: join(base, config.incomingDirectory),
    sorted,
    archive: join(base, config.archiveDirectory),
    categoryDirs: categories(config.extensionMap).map((category) => join(sorted, category)),
  };
}

/**
 * Creates the incoming, sorted and archive folders plus one folder per
 * category. Safe to run again on a tree that already exists.
 */
export function prepareDirectories(layout: DirectoryLayout): void {
  const dirs = [layout.incoming, layout.sorted, layout.archive, ...layout.categoryDirs];
  for (const dir of dirs) {
    mkdirSync(dir, { recursive: true });
  }
}
