import * as fs from 'fs';
import * as path from 'path';

const LOG_TAG = 'stubdoc-i18n';

let logFile: string | null = null;
let quiet = false;

export interface LoggingOptions {
  /** Also append every message to this file */
  file?: string | null;
  /** Suppress stderr output (the log file still receives messages) */
  quiet?: boolean;
}

export function configureLogging(options: LoggingOptions): void {
  if (options.file !== undefined) {
    logFile = options.file;
    if (logFile) {
      try {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
      } catch (error) {
        console.error(`[${LOG_TAG}] Failed to create log directory:`, error);
      }
    }
  }
  if (options.quiet !== undefined) {
    quiet = options.quiet;
  }
}

/**
 * Log to stderr and, when configured, to the log file
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [${LOG_TAG}] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  if (!quiet) {
    console.error(fullMessage);
  }

  if (!logFile) {
    return;
  }
  try {
    fs.appendFileSync(logFile, fullMessage + '\n', 'utf-8');
  } catch (error) {
    // Don't fail if we can't write to log file
    console.error(`[${LOG_TAG}] Failed to write to log file:`, error);
  }
}
