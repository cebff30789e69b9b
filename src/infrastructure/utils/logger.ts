/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { CONFIG } from "@/config/config";
import {
  LogLevel,
  LogCategory,
  LOG_LEVEL_RANK,
  isLogLevel,
} from "../../shared/constants/LogEnums";

/**
 * Logging utility for the engine.
 *
 * Features:
 * - Console output with colored levels
 * - Minimum level filter (LOG_LEVEL)
 * - Memory buffer with periodic evacuation to daily JSONL files
 * - Category-based logging for subsystem identification
 * - Tick stamping so every entry can be tied to a simulation tick
 * - Throttling to prevent log spam
 */

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  /** Agent name if the log relates to a specific agent */
  agentId?: string;
  /** Simulation tick when the log was created */
  tick: number;
  data?: unknown;
}

/**
 * Aggregated counters for analysis.
 */
interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: string;
  tick?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  consoleOutput: boolean;
  fileOutput: boolean;
  logDir: string;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  writeIntervalMs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
  maxRotationDays: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: isLogLevel(CONFIG.LOG.LEVEL) ? CONFIG.LOG.LEVEL : LogLevel.INFO,
  consoleOutput: CONFIG.LOG.CONSOLE,
  fileOutput: CONFIG.LOG.FILE_OUTPUT,
  logDir: CONFIG.LOG.DIR,
  maxMemoryLogs: 5000,
  evacuationThreshold: CONFIG.LOG.EVACUATION_THRESHOLD,
  writeIntervalMs: CONFIG.LOG.WRITE_INTERVAL_MS,
  throttleWindowMs: CONFIG.LOG.THROTTLE_WINDOW_MS,
  maxThrottleCount: CONFIG.LOG.MAX_THROTTLE_COUNT,
  maxRotationDays: CONFIG.LOG.MAX_ROTATION_DAYS,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

let logSequence = 0;

function generateLogId(): string {
  logSequence = (logSequence + 1) % Number.MAX_SAFE_INTEGER;
  return `${Date.now()}-${logSequence.toString(36)}`;
}

/**
 * Current date string for file rotation (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

function isLogCategory(value: unknown): value is LogCategory {
  const known: readonly unknown[] = Object.values(LogCategory);
  return known.includes(value);
}

/**
 * Logger with memory buffering and file evacuation.
 * Console: levels at or above minLevel, with colors
 * Memory: same entries with full metadata (queryable)
 * Files: rotated daily, JSON Lines
 */
export class Logger {
  private readonly config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private readonly throttleMap = new Map<
    string,
    { count: number; lastTime: number }
  >();
  private isEvacuating = false;
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private currentLogDate: string;
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.currentLogDate = getDateString();
    this.metrics = this.initMetrics();

    if (this.config.fileOutput) {
      this.ensureLogDir();
      this.evacuationInterval = setInterval(
        () => this.checkEvacuation(),
        this.config.writeIntervalMs,
      );
      // The host owns the process lifetime; pending logs must not hold it open.
      this.evacuationInterval.unref();
      process.once("beforeExit", () => {
        this.flush().catch((error: unknown) => {
          console.error(
            "Failed to flush logs on exit:",
            error instanceof Error ? error.message : String(error),
          );
        });
      });
    }
  }

  private initMetrics(): LogMetrics {
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {
        [LogCategory.SIMULATION]: 0,
        [LogCategory.AI]: 0,
        [LogCategory.TASKS]: 0,
        [LogCategory.POPULATION]: 0,
        [LogCategory.COMBAT]: 0,
        [LogCategory.PERFORMANCE]: 0,
        [LogCategory.GENERAL]: 0,
      },
      totalCount: 0,
    };
  }

  private ensureLogDir(): void {
    try {
      if (!fs.existsSync(this.config.logDir)) {
        fs.mkdirSync(this.config.logDir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private getLogFilePath(): string {
    return path.join(this.config.logDir, `logs-${this.currentLogDate}.jsonl`);
  }

  private checkDateRotation(): void {
    const today = getDateString();
    if (today !== this.currentLogDate) {
      this.currentLogDate = today;
      this.cleanupOldLogs();
    }
  }

  private cleanupOldLogs(): void {
    try {
      const files = fs.readdirSync(this.config.logDir);
      const cutoffDate = new Date();
      cutoffDate.setDate(cutoffDate.getDate() - this.config.maxRotationDays);

      for (const file of files) {
        const match = file.match(/^logs-(\d{4}-\d{2}-\d{2})\.jsonl$/);
        if (match && new Date(match[1]) < cutoffDate) {
          fs.unlinkSync(path.join(this.config.logDir, file));
        }
      }
    } catch (error) {
      console.warn("Failed to cleanup old logs:", error);
    }
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}] [tick ${this.currentTick}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.totalCount++;

    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }

    if (
      this.config.fileOutput &&
      this.memoryBuffer.length >= this.config.evacuationThreshold
    ) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (this.isEvacuating || this.memoryBuffer.length === 0) return;

    this.checkDateRotation();
    this.isEvacuating = true;
    const logsToWrite = this.memoryBuffer;
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  private checkEvacuation(): void {
    if (this.memoryBuffer.length > 0) {
      this.evacuateToFile();
    }

    const now = Date.now();
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  /**
   * Set the current simulation tick for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  getTick(): number {
    return this.currentTick;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.config.minLevel];
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { agentId?: string; data?: unknown },
  ): void {
    if (!this.isLevelEnabled(level)) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const now = Date.now();
    this.addToMemory({
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      agentId: options?.agentId,
      tick: this.currentTick,
      data: options?.data,
    });

    if (!this.config.consoleOutput) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, options?.data ?? "");
        break;
    }
  }

  private logWithOptionalCategory(
    level: LogLevel,
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  debug(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log an agent-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, {
      agentId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
      totalCount: this.metrics.totalCount,
    };
  }

  /**
   * Query logs still held in the memory buffer.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, agentId, tick } = filter;

    return this.memoryBuffer.filter(
      (entry) =>
        (!levels?.length || levels.includes(entry.level)) &&
        (!categories?.length || categories.includes(entry.category)) &&
        (agentId === undefined || entry.agentId === agentId) &&
        (tick === undefined || entry.tick === tick),
    );
  }

  /**
   * Drops buffered entries and counters without writing them.
   */
  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
    this.metrics = this.initMetrics();
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    if (!this.config.fileOutput) return;
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  destroy(): void {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
      this.evacuationInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
