/**
 * Logging for issue-ref-hook
 *
 * Consola-based singleton logger writing to stderr. WARN and ERROR always print;
 * INFO and DEBUG only when verbose. The hook keeps no log file: the commit
 * message is the only file it touches.
 *
 * Level sources (in order of priority):
 * 1. CLI flags (--quiet, --verbose)
 * 2. ISSUE_HOOK_LOG_LEVEL environment variable
 * 3. Default (INFO)
 */

import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LOG_LEVEL_ENV } from './constants.js';
import { setColorEnabled } from './colors.js';

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 */
class ConditionalStderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;

  constructor(verbose: boolean, useColors: boolean) {
    this.verbose = verbose;
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    // Level < 2 means warn (1) or error/fatal (0): always print
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const { name, color } = levelLabel(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);
    const prefix = this.useColors ? `${color}[${name}]${RESET}` : `[${name}]`;

    process.stderr.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';

// Labels for the levels the hook logs at
function levelLabel(level: number): { name: string; color: string } {
  if (level <= 0) return { name: 'ERROR', color: '\x1b[31m' };
  if (level === 1) return { name: 'WARN', color: '\x1b[33m' };
  if (level <= 3) return { name: 'INFO', color: '\x1b[36m' };
  return { name: 'DEBUG', color: '\x1b[90m' };
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a)))
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters; call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: 3,
  reporters: [],
});

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}

/**
 * Configure the logger from CLI flags and the environment.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  let level: number;

  if (options.quiet) {
    level = 0; // error only
  } else if (options.verbose) {
    level = 4; // debug
  } else {
    const fromEnv = process.env[LOG_LEVEL_ENV];
    level = (fromEnv !== undefined ? parseLogLevel(fromEnv) : undefined) ?? 3;
  }

  logger.level = level;

  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  // An env level of debug/trace should be visible without --verbose
  const verbose = options.quiet ? false : (options.verbose ?? false) || level >= 4;
  logger.setReporters([new ConditionalStderrReporter(verbose, useColors)]);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: -999,
    error: 0,
    warn: 1,
    warning: 1,
    info: 3,
    debug: 4,
    trace: 5,
    verbose: 4,
  };
  return mapping[normalized];
}

/**
 * Reset module-level state for test isolation.
 */
export function _resetForTesting(): void {
  logger.setReporters([]);
  logger.level = 3;
}
