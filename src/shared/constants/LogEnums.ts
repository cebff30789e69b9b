/**
 * Log level enumerations for the engine.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, lowest severity first.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Severity rank used to filter entries below the configured minimum level.
 */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Type guard for level names read from the environment.
 */
export function isLogLevel(value: string): value is LogLevel {
  const known: readonly string[] = Object.values(LogLevel);
  return known.includes(value);
}

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Tick runner and bootstrap */
  SIMULATION = "simulation",
  /** Task selection */
  AI = "ai",
  /** Task execution and registry mutations */
  TASKS = "tasks",
  /** Agent creation */
  POPULATION = "population",
  /** Tower targeting */
  COMBAT = "combat",
  /** CPU timing scopes */
  PERFORMANCE = "performance",
  /** General/uncategorized logs */
  GENERAL = "general",
}
