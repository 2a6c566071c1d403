import { existsSync } from 'fs';
import { extname, join } from 'path';

/**
 * Returns a path in `destinationDir` for `filename` that nothing occupies yet.
 *
 * A taken name gets a counter before its extension: `report.txt`,
 * `report 1.txt`, `report 2.txt`, ... Each candidate is checked in turn, so two
 * concurrent callers can still be handed the same free name.
 */
export function resolveUniquePath(destinationDir: string, filename: string): string {
  const ext = extname(filename);
  const base = filename.slice(0, filename.length - ext.length);

  let destPath = join(destinationDir, filename);
  let counter = 1;
  while (existsSync(destPath)) {
    destPath = join(destinationDir, `${base} ${counter}${ext}`);
    counter++;
  }

  return destPath;
}
