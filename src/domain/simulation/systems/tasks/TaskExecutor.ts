import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory, LogLevel } from "@/infrastructure/utils/logger";
import { ErrorKind } from "@/shared/constants/StatusEnums";
import { ResourceType } from "@/shared/constants/StructureEnums";
import { TaskKind } from "@/shared/constants/TaskEnums";
import { describeTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import type { AgentHandle } from "@/shared/types/simulation/world";
import { ReferentResolver } from "../../core/ReferentResolver";
import type { TaskPolicy } from "../../core/SimulationConstants";
import type { OccupiedEntry } from "../../core/TaskRegistry";
import { simulationEvents, GameEventType } from "../../core/events";
import type { IWorldPort } from "../../ports";
import { dispatchHandler } from "./handlers";
import type { HandlerExecutionResult } from "./types";
import { evictResult } from "./types";

/**
 * Energy preconditions checked before resolving a task. Upgrading needs
 * something to spend, harvesting needs somewhere to put it.
 */
export function passesEnergyGuard(agent: AgentHandle, task: TaskHandle): boolean {
  switch (task.kind) {
    case TaskKind.UPGRADE:
      return agent.store.getUsedCapacity(ResourceType.ENERGY) > 0;
    case TaskKind.HARVEST:
      return agent.store.getFreeCapacity(ResourceType.ENERGY) > 0;
    case TaskKind.CONSTRUCT:
    case TaskKind.REPAIR:
    case TaskKind.STORE:
      return true;
    default:
      return false;
  }
}

/**
 * Runs one agent's current task for one tick and evicts it when the
 * outcome says so.
 */
@injectable()
export class TaskExecutor {
  constructor(
    @inject(TYPES.TaskPolicy) private readonly policy: TaskPolicy,
    @inject(TYPES.ReferentResolver) private readonly resolver: ReferentResolver,
  ) {}

  public execute(
    world: IWorldPort,
    agent: AgentHandle,
    entry: OccupiedEntry,
  ): HandlerExecutionResult {
    const tick = world.getTick();
    const result = this.run(world, agent, entry.task, tick);

    if (result.evict) {
      this.evict(entry, result, tick);
    }
    return result;
  }

  private run(
    world: IWorldPort,
    agent: AgentHandle,
    task: TaskHandle,
    tick: number,
  ): HandlerExecutionResult {
    if (!passesEnergyGuard(agent, task)) {
      return evictResult(
        ErrorKind.STALE_TASK,
        `${describeTask(task)} no longer fits the agent's load`,
      );
    }

    const resolved = this.resolver.resolve(world, task);
    if (!resolved) {
      return evictResult(ErrorKind.REFERENT_GONE, `${describeTask(task)} target is gone`);
    }

    return dispatchHandler({ agent, resolved, policy: this.policy, tick });
  }

  private evict(
    entry: OccupiedEntry,
    result: HandlerExecutionResult,
    tick: number,
  ): void {
    const task = entry.remove();
    const level =
      result.reason === ErrorKind.ACTION_REJECTED ? LogLevel.WARN : LogLevel.DEBUG;

    logger.agentLog(
      level,
      LogCategory.TASKS,
      entry.agentId,
      result.message ?? `${describeTask(task)} ${result.outcome}`,
      { reason: result.reason, code: result.code },
    );
    simulationEvents.emitEvent(GameEventType.TASK_EVICTED, {
      agentId: entry.agentId,
      task,
      outcome: result.outcome,
      reason: result.reason,
      tick,
    });
  }
}
