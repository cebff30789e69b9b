import path from "path";

/**
 * Application configuration loaded from environment variables.
 *
 * Only process-level knobs live here. Gameplay thresholds (priority tables,
 * ranges, population rows) are policy data, see
 * `domain/simulation/core/SimulationConstants` and `domain/data`.
 *
 * @module config
 */

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

/**
 * Application configuration object.
 *
 * @property RNG_SEED - Seed of the process-wide random generator (default: 200)
 * @property CPU_BUDGET_MS - CPU per tick above which the runner warns (default: 20)
 * @property TIMER_LOGGING - Whether TickTimer scopes log their CPU usage
 * @property LOG - Logger settings, see infrastructure/utils/logger
 */
export const CONFIG = {
  RNG_SEED: process.env.RNG_SEED || "200",
  CPU_BUDGET_MS: readNumber("CPU_BUDGET_MS", 20),
  TIMER_LOGGING: process.env.TIMER_LOGGING !== "false",
  LOG: {
    LEVEL: process.env.LOG_LEVEL || "info",
    CONSOLE: process.env.LOG_CONSOLE !== "false",
    FILE_OUTPUT: process.env.LOG_FILE_OUTPUT !== "false",
    DIR: process.env.LOG_DIR
      ? path.resolve(process.env.LOG_DIR)
      : path.join(process.cwd(), "logs"),
    EVACUATION_THRESHOLD: readNumber("LOG_EVACUATION_THRESHOLD", 4000),
    WRITE_INTERVAL_MS: readNumber("LOG_WRITE_INTERVAL_MS", 5000),
    THROTTLE_WINDOW_MS: readNumber("LOG_THROTTLE_WINDOW_MS", 5000),
    MAX_THROTTLE_COUNT: readNumber("LOG_MAX_THROTTLE_COUNT", 3),
    MAX_ROTATION_DAYS: readNumber("LOG_MAX_ROTATION_DAYS", 7),
  },
};
