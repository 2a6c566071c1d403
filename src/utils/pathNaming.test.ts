import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { resolveUniquePath } from './pathNaming';

describe('resolveUniquePath', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'file-sorter-naming-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should keep the original name when nothing is there', () => {
    expect(resolveUniquePath(testDir, 'report.txt')).toBe(join(testDir, 'report.txt'));
  });

  it('should append a counter when the name is taken', () => {
    writeFileSync(join(testDir, 'report.txt'), 'first');

    expect(resolveUniquePath(testDir, 'report.txt')).toBe(join(testDir, 'report 1.txt'));
  });

  it('should keep counting past occupied slots', () => {
    writeFileSync(join(testDir, 'report.txt'), 'first');
    writeFileSync(join(testDir, 'report 1.txt'), 'second');

    expect(resolveUniquePath(testDir, 'report.txt')).toBe(join(testDir, 'report 2.txt'));
  });

  it('should count up as each resolved name gets used', () => {
    writeFileSync(join(testDir, 'report.txt'), 'first');

    const second = resolveUniquePath(testDir, 'report.txt');
    writeFileSync(second, 'second');
    const third = resolveUniquePath(testDir, 'report.txt');

    expect(second).toBe(join(testDir, 'report 1.txt'));
    expect(third).toBe(join(testDir, 'report 2.txt'));
  });

  it('should only treat the last dot as the extension', () => {
    writeFileSync(join(testDir, 'backup.tar.gz'), 'data');

    expect(resolveUniquePath(testDir, 'backup.tar.gz')).toBe(join(testDir, 'backup.tar 1.gz'));
  });

  it('should append the counter to names without an extension', () => {
    writeFileSync(join(testDir, 'Makefile'), 'all:');
    writeFileSync(join(testDir, '.env'), 'A=1');

    expect(resolveUniquePath(testDir, 'Makefile')).toBe(join(testDir, 'Makefile 1'));
    expect(resolveUniquePath(testDir, '.env')).toBe(join(testDir, '.env 1'));
  });

  it('should not be confused by a different base name with a counter', () => {
    writeFileSync(join(testDir, 'report 1.txt'), 'unrelated');

    expect(resolveUniquePath(testDir, 'report.txt')).toBe(join(testDir, 'report.txt'));
  });
});
