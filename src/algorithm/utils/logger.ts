/**
 * Site Layout Kernel - Logging Utility
 *
 * Leveled console logging. The kernel is a library, so it stays quiet (WARN)
 * unless the host raises the level, either in code or through the
 * SITE_KERNEL_LOG_LEVEL environment variable.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

export const LOG_LEVEL_ENV_VAR = 'SITE_KERNEL_LOG_LEVEL';

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE
};

/**
 * Parses a level name (case-insensitive). Unknown names yield `undefined`.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

let currentLevel: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV_VAR]) ?? LogLevel.WARN;

function format(scope: string | undefined, msg: string): string {
  return scope ? `[${scope}] ${msg}` : msg;
}

export interface ScopedLogger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

function createScopedLogger(scope?: string): ScopedLogger {
  return {
    /**
     * Algorithm tracing
     * Use for: building counts, placement attempts, offset tiers, triangulation passes
     */
    debug: (msg, ...args) => {
      if (currentLevel <= LogLevel.DEBUG) {
        console.log(`[DEBUG] ${format(scope, msg)}`, ...args);
      }
    },

    /**
     * Major steps
     * Use for: request size, generation start/end, placement strategy selection
     */
    info: (msg, ...args) => {
      if (currentLevel <= LogLevel.INFO) {
        console.log(`[INFO] ${format(scope, msg)}`, ...args);
      }
    },

    /**
     * Unexpected but resolved conditions
     * Use for: offset fallback, placement shortfall, ignored parameters, clamped tolerances
     */
    warn: (msg, ...args) => {
      if (currentLevel <= LogLevel.WARN) {
        console.warn(`[WARN] ${format(scope, msg)}`, ...args);
      }
    },

    /**
     * Failures
     * Use for: rejected inputs, unexpected faults caught at an entry point
     */
    error: (msg, ...args) => {
      if (currentLevel <= LogLevel.ERROR) {
        console.error(`[ERROR] ${format(scope, msg)}`, ...args);
      }
    }
  };
}

/**
 * Logger with configurable levels.
 * Default level is WARN - only warnings and errors are shown.
 */
export const Logger = {
  ...createScopedLogger(),

  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /**
   * Logger whose messages are tagged with `[scope]`
   */
  scoped: (scope: string): ScopedLogger => createScopedLogger(scope)
};

/**
 * Convenience function to enable debug logging during development
 */
export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

/**
 * Convenience function to disable all logging (production mode)
 */
export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
