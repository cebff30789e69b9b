import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory, LogLevel } from "@/infrastructure/utils/logger";
import { ResourceType } from "@/shared/constants/StructureEnums";
import { describeTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import type { AgentHandle } from "@/shared/types/simulation/world";
import type { TaskPolicy } from "../../core/SimulationConstants";
import type { VacantEntry } from "../../core/TaskRegistry";
import { simulationEvents, GameEventType } from "../../core/events";
import type { IWorldPort } from "../../ports";
import { runDetectors } from "./detectors";

/**
 * Picks a task for agents whose registry entry is vacant.
 *
 * Agents carrying energy walk the priority list (controller danger, refills,
 * road repair, construction, fallback upgrade); empty agents go harvesting.
 * No candidate means the agent idles this tick, which is not an error.
 */
@injectable()
export class TaskSelector {
  constructor(
    @inject(TYPES.TaskPolicy) private readonly policy: TaskPolicy,
  ) {}

  public chooseTask(world: IWorldPort, agent: AgentHandle): TaskHandle | undefined {
    const room = world.getRoom(agent.pos.roomName);
    if (!room) return undefined;

    return runDetectors({
      agent,
      room,
      policy: this.policy,
      carriedEnergy: agent.store.getUsedCapacity(ResourceType.ENERGY),
    });
  }

  /**
   * Chooses and inserts a task into the vacant entry. Returns the task, or
   * `undefined` when the agent stays idle.
   */
  public assignTask(
    entry: VacantEntry,
    world: IWorldPort,
    agent: AgentHandle,
  ): TaskHandle | undefined {
    const tick = world.getTick();
    const task = this.chooseTask(world, agent);

    if (!task) {
      simulationEvents.emitEvent(GameEventType.AGENT_IDLE, {
        agentId: agent.name,
        tick,
      });
      return undefined;
    }

    entry.insert(task);
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AI,
      agent.name,
      `assigned ${describeTask(task)}`,
    );
    simulationEvents.emitEvent(GameEventType.TASK_ASSIGNED, {
      agentId: agent.name,
      task,
      tick,
    });
    return task;
  }
}
