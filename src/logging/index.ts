/**
 * Logging Module
 *
 * Default logger implementations. Every client, store and sender accepts a
 * Logger and falls back to `defaultLogger`.
 */

import type { Logger } from '../types/index.js';

export type { Logger };

/**
 * Console logger: one line per entry, metadata serialized as JSON
 */
export const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
