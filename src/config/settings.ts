/**
 * Configuration Settings
 *
 * Reads settings from ~/.stubdoc-i18n/config (JSON format), or from the file
 * given with --config. Provides defaults for all settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { log } from '../logging/logger';
import { DEFAULT_DOCSTRING_OPTIONS } from '../core/types';

export interface StubdocSettings {
  /** Maximum physical line width. 0 disables wrapping */
  lineWidth: number;
  /** Fixed opening delimiter width; null measures each literal's own prefix and quote */
  openingDelimiterWidth: number | null;
  /** Optional file that receives a copy of every log line */
  logFile: string | null;
}

export const DEFAULT_SETTINGS: StubdocSettings = {
  lineWidth: DEFAULT_DOCSTRING_OPTIONS.lineWidth,
  openingDelimiterWidth: null,
  logFile: null,
};

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.stubdoc-i18n', 'config');

/**
 * Cached settings per config path
 */
const cache = new Map<string, StubdocSettings>();

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Load raw config from disk. Missing or unreadable files yield an empty config.
 */
function loadConfig(configPath: string): Record<string, unknown> {
  try {
    if (!fs.existsSync(configPath)) {
      return {};
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    const config: unknown = JSON.parse(content);
    if (typeof config !== 'object' || config === null || Array.isArray(config)) {
      log(`[Config] Ignoring ${configPath}: expected a JSON object`);
      return {};
    }
    return Object.fromEntries(Object.entries(config));
  } catch (error) {
    log(`[Config] Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

function readWidth<T extends number | null>(config: Record<string, unknown>, key: string, fallback: T): number | T {
  const value = config[key];
  if (value === undefined) {
    return fallback;
  }
  if (!isNonNegativeInteger(value)) {
    log(`[Config] Invalid ${key} ${JSON.stringify(value)}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Get settings with defaults
 */
export function getSettings(configPath: string = DEFAULT_CONFIG_PATH): StubdocSettings {
  const cached = cache.get(configPath);
  if (cached) {
    return cached;
  }

  const config = loadConfig(configPath);
  const logFile = typeof config.logFile === 'string' && config.logFile ? config.logFile : null;

  const settings: StubdocSettings = {
    lineWidth: readWidth(config, 'lineWidth', DEFAULT_SETTINGS.lineWidth),
    openingDelimiterWidth: readWidth(config, 'openingDelimiterWidth', DEFAULT_SETTINGS.openingDelimiterWidth),
    logFile,
  };

  cache.set(configPath, settings);
  return settings;
}

/**
 * Force reload config (useful for testing or after config changes)
 */
export function reloadConfig(): void {
  cache.clear();
}
