import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';

dotenv.config();

export type WatchMode = 'native' | 'polling';

/**
 * Sorting rules loaded from the JSON configuration file. Directory names are
 * relative to the base directory the operator selects.
 */
export interface SorterConfig {
  readonly incomingDirectory: string;
  readonly sortedDirectory: string;
  readonly archiveDirectory: string;
  readonly extensionMap: Readonly<Record<string, string>>;
}

export interface ConfigEnv {
  CONFIG_PATH: string;
  LOG_FILE: string;
  LOG_MAX_SIZE_MB: string;
  WATCH_MODE: WatchMode;
  POLL_INTERVAL_MS: string;
  WRITE_STABILITY_MS: string;
  BASE_DIR?: string;
}

const REQUIRED_DIRECTORY_KEYS = ['incoming_directory', 'sorted_directory', 'archive_directory'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates parsed configuration file content. Every problem found is
 * reported in a single error.
 */
export function parseSorterConfig(raw: unknown): SorterConfig {
  if (!isRecord(raw)) {
    throw new Error('Config file must contain a JSON object');
  }

  const problems: string[] = [];

  for (const key of REQUIRED_DIRECTORY_KEYS) {
    const value = raw[key];
    if (typeof value !== 'string' || value.trim() === '') {
      problems.push(`${key} must be a non-empty string`);
    }
  }

  const extensionMap: Record<string, string> = {};
  const extensions = raw.extensions;
  if (!isRecord(extensions)) {
    problems.push('extensions must be an object mapping extensions to folder names');
  } else {
    for (const [ext, category] of Object.entries(extensions)) {
      if (typeof category !== 'string' || category.trim() === '') {
        problems.push(`extensions["${ext}"] must be a non-empty string`);
        continue;
      }
      extensionMap[ext.toLowerCase()] = category;
    }
  }

  if (problems.length > 0) {
    throw new Error(`Invalid config: ${problems.join('; ')}`);
  }

  return Object.freeze({
    incomingDirectory: String(raw.incoming_directory),
    sortedDirectory: String(raw.sorted_directory),
    archiveDirectory: String(raw.archive_directory),
    extensionMap: Object.freeze(extensionMap),
  });
}

export class ConfigService {
  private env: ConfigEnv;
  private config: SorterConfig;

  constructor() {
    this.env = this.loadEnv();
    this.config = this.loadConfigFile(this.env.CONFIG_PATH);
  }

  private loadEnv(): ConfigEnv {
    const watchMode = process.env.WATCH_MODE || 'native';
    if (watchMode !== 'native' && watchMode !== 'polling') {
      throw new Error(`WATCH_MODE must be "native" or "polling", got "${watchMode}"`);
    }

    return {
      CONFIG_PATH: resolve(process.env.CONFIG_PATH || './config.json'),
      LOG_FILE: process.env.LOG_FILE || './logs/file-sorter.log',
      LOG_MAX_SIZE_MB: process.env.LOG_MAX_SIZE_MB || '10',
      WATCH_MODE: watchMode,
      POLL_INTERVAL_MS: process.env.POLL_INTERVAL_MS || '1000',
      WRITE_STABILITY_MS: process.env.WRITE_STABILITY_MS || '0',
      BASE_DIR: process.env.BASE_DIR || undefined,
    };
  }

  private loadConfigFile(configPath: string): SorterConfig {
    let content: string;
    try {
      content = readFileSync(configPath, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`No config found at ${configPath}: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Couldn't parse config file ${configPath}: ${message}`);
    }

    return parseSorterConfig(raw);
  }

  getEnv(): ConfigEnv {
    return this.env;
  }

  getConfig(): SorterConfig {
    return this.config;
  }
}
