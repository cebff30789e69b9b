import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import { CONFIG } from "../../../config/config";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import type { TickReport } from "../../../shared/types/simulation/events";
import type { IWorldPort } from "../ports";
import { DefenseSystem } from "../systems/defense/DefenseSystem";
import { PopulationSystem } from "../systems/population/PopulationSystem";
import { TaskSystem } from "../systems/tasks/TaskSystem";
import { simulationEvents, GameEventType } from "./events";
import { TickTimer, type CpuClock } from "./TickTimer";

/**
 * Per-tick orchestrator.
 *
 * Runs defense, then the task pass, then population, flushes the batched
 * simulation events and reports the CPU the tick used. The whole tick is a
 * "Main Loop" timer scope. Going over
 * `CONFIG.CPU_BUDGET_MS` only produces a warning; a tick is never cut short.
 *
 * @see TaskSystem for the agent pass
 */
@injectable()
export class SimulationRunner {
  private tickCounter = 0;
  private lastReport?: TickReport;

  constructor(
    @inject(TYPES.DefenseSystem) private readonly defenseSystem: DefenseSystem,
    @inject(TYPES.TaskSystem) private readonly taskSystem: TaskSystem,
    @inject(TYPES.PopulationSystem)
    private readonly populationSystem: PopulationSystem,
  ) {}

  public runTick(world: IWorldPort): TickReport {
    const tick = world.getTick();
    const clock = (): number => world.getCpuUsed();
    logger.setTick(tick);

    return TickTimer.measure("Main Loop", clock, () =>
      this.runPhases(world, tick, clock),
    ).result;
  }

  private runPhases(world: IWorldPort, tick: number, clock: CpuClock): TickReport {
    const defense = this.timed("defense", clock, () =>
      this.defenseSystem.update(world),
    );
    const tasks = this.timed("tasks", clock, () => this.taskSystem.update(world));
    const population = this.timed("population", clock, () =>
      this.populationSystem.update(world),
    );

    const cpuUsed = world.getCpuUsed();
    const report: TickReport = {
      tick,
      cpuUsed,
      overBudget: cpuUsed > CONFIG.CPU_BUDGET_MS,
      defense,
      tasks,
      population,
    };

    if (report.overBudget) {
      logger.warn(
        `Tick ${tick} used ${cpuUsed.toFixed(2)}cpu (budget ${CONFIG.CPU_BUDGET_MS})`,
        LogCategory.PERFORMANCE,
        report,
      );
    } else {
      logger.debug(`Tick ${tick} done`, LogCategory.SIMULATION, report);
    }

    simulationEvents.emitEvent(GameEventType.TICK_COMPLETED, report);
    simulationEvents.flushEvents();

    this.tickCounter++;
    this.lastReport = report;
    return report;
  }

  /** Ticks processed since this runner was created. */
  public getTickCounter(): number {
    return this.tickCounter;
  }

  public getLastReport(): TickReport | undefined {
    return this.lastReport;
  }

  private timed<T>(name: string, clock: CpuClock, fn: () => T): T {
    return TickTimer.measure(name, clock, fn).result;
  }
}
