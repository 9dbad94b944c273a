/**
 * Workflow logging
 *
 * Every action is recorded in memory so a page can be inspected after the
 * fact (window.EdgeMediaFallback.logs()). Console output only in debug mode.
 */

import type { LogEntry, LogLevel, Logger } from './types';

const CONSOLE_PREFIX = 'EdgeMediaFallback:';

// The client lives as long as the page; keep only the most recent entries
export const MAX_LOG_ENTRIES = 100;

/**
 * Create logger for workflow tracking
 */
export function createLogger(
  debugMode: boolean,
  startTime: number = Date.now(),
  maxEntries: number = MAX_LOG_ENTRIES
): Logger {
  const logs: LogEntry[] = [];

  const record = (level: LogLevel, action: string, details?: string) => {
    const entry: LogEntry = {
      time: `${Date.now() - startTime}ms`,
      level,
      action,
      details,
    };

    logs.push(entry);
    if (logs.length > maxEntries) {
      logs.shift();
    }

    if (!debugMode) {
      return;
    }

    const line = `${CONSOLE_PREFIX} [${entry.time}] ${action}${details ? ': ' + details : ''}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    log: (action, details) => record('info', action, details),
    warn: (action, details) => record('warn', action, details),
    error: (action, details) => record('error', action, details),
    entries: () => logs.slice(),
  };
}
