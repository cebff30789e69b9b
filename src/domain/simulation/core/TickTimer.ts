import { CONFIG } from "../../../config/config";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";

/** Host CPU clock, milliseconds used so far in the current tick. */
export type CpuClock = () => number;

export interface TickTimerOptions {
  /** Log the measurement on `stop()`. Defaults to `CONFIG.TIMER_LOGGING`. */
  logging?: boolean;
}

/**
 * Measures the CPU a named scope consumes, on the host's CPU clock.
 *
 * ```ts
 * const timer = new TickTimer("tasks", () => world.getCpuUsed());
 * ...
 * timer.stop(); // "tasks done! | Init. At: 1.20cpu | Added: 0.85cpu"
 * ```
 */
export class TickTimer {
  private readonly startedAt: number;
  private stoppedWith?: number;

  constructor(
    private readonly name: string,
    private readonly clock: CpuClock,
    private readonly options: TickTimerOptions = {},
  ) {
    this.startedAt = clock();
  }

  public get initAt(): number {
    return this.startedAt;
  }

  /**
   * Ends the scope and returns the CPU it used. Stopping twice returns the
   * first measurement and logs once.
   */
  public stop(): number {
    if (this.stoppedWith !== undefined) return this.stoppedWith;

    const added = this.clock() - this.startedAt;
    this.stoppedWith = added;

    if (this.options.logging ?? CONFIG.TIMER_LOGGING) {
      logger.info(formatTimerReport(this.name, this.startedAt, added), LogCategory.PERFORMANCE);
    }
    return added;
  }

  /**
   * Times `fn` as a scope of its own.
   */
  public static measure<T>(
    name: string,
    clock: CpuClock,
    fn: () => T,
    options?: TickTimerOptions,
  ): { result: T; cpu: number } {
    const timer = new TickTimer(name, clock, options);
    try {
      const result = fn();
      return { result, cpu: timer.stop() };
    } finally {
      timer.stop();
    }
  }
}

export function formatTimerReport(name: string, initAt: number, added: number): string {
  return `\n${name} done!\n\t| Init. At: ${initAt.toFixed(2)}cpu\n\t| Added: ${added.toFixed(2)}cpu`;
}
