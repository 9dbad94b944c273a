/**
 * Client configuration
 *
 * Parsed from window.edgeMediaFallbackConfig (see config.ts).
 */
export interface ClientConfig {
  debug: boolean;
  warming: boolean;
  lazyCheckIntervalMs: number;
  lazyMaxChecks: number;
}

/**
 * Where an element currently loads its source from
 *
 * Stored on the element itself as data-fallback:
 *   absent = edge, "1" = origin, anything else = failed (terminal)
 */
export type SourceStage = 'edge' | 'origin' | 'failed';

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Log entry for debugging
 */
export interface LogEntry {
  time: string;
  level: LogLevel;
  action: string;
  details?: string;
}

export interface Logger {
  log(action: string, details?: string): void;
  warn(action: string, details?: string): void;
  error(action: string, details?: string): void;
  entries(): LogEntry[];
}

/**
 * Shared by every state machine entry point
 */
export interface FallbackContext {
  config: ClientConfig;
  logger: Logger;
}

/**
 * API published on window.EdgeMediaFallback
 */
export interface PublicApi {
  version: string;
  handleError(img: HTMLImageElement): boolean;
  handleMediaError(media: HTMLMediaElement): boolean;
  logs(): LogEntry[];
}

declare global {
  interface Window {
    edgeMediaFallbackConfig?: unknown;
    EdgeMediaFallback?: PublicApi;
  }
}
