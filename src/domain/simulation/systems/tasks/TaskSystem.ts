import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory, LogLevel } from "@/infrastructure/utils/logger";
import { EntryState, TaskOutcome } from "@/shared/constants/TaskEnums";
import type { TaskTickStats } from "@/shared/types/simulation/events";
import type { AgentHandle, AgentId } from "@/shared/types/simulation/world";
import { TaskRegistry } from "../../core/TaskRegistry";
import type { LockedTaskRegistry } from "../../core/TaskRegistry";
import { simulationEvents, GameEventType } from "../../core/events";
import type { IWorldPort } from "../../ports";
import { TaskExecutor } from "./TaskExecutor";
import { TaskSelector } from "./TaskSelector";

export function emptyTaskStats(): TaskTickStats {
  return {
    processed: 0,
    skippedSpawning: 0,
    assigned: 0,
    completed: 0,
    evicted: 0,
    idle: 0,
    failures: 0,
    pruned: 0,
  };
}

/**
 * System driving every agent's task once per tick.
 *
 * Features:
 * - Exclusive registry lock for the whole agent pass
 * - Pruning of entries whose agent no longer exists
 * - Execute-or-select per agent, reselecting in the same tick after an eviction
 * - Per-agent exception isolation
 *
 * @see TaskExecutor for the range and failure policy
 * @see TaskSelector for the priority scan
 */
@injectable()
export class TaskSystem {
  constructor(
    @inject(TYPES.TaskRegistry) private readonly registry: TaskRegistry,
    @inject(TYPES.TaskSelector) private readonly selector: TaskSelector,
    @inject(TYPES.TaskExecutor) private readonly executor: TaskExecutor,
  ) {}

  public update(world: IWorldPort): TaskTickStats {
    const tick = world.getTick();
    const agents = new Map<AgentId, AgentHandle>();
    for (const agent of world.getAgents()) {
      agents.set(agent.name, agent);
    }

    return this.registry.withLock((locked) => {
      const stats = emptyTaskStats();

      const pruned = locked.prune((agentId) => agents.has(agentId));
      if (pruned.length > 0) {
        stats.pruned = pruned.length;
        logger.debug(
          `Pruned ${pruned.length} task(s) of gone agents`,
          LogCategory.TASKS,
          { agentIds: pruned },
        );
        simulationEvents.emitEvent(GameEventType.AGENTS_PRUNED, {
          agentIds: pruned,
          tick,
        });
      }

      const agentIds = Array.from(agents.keys());
      for (const agentId of agentIds) {
        const agent = agents.get(agentId);
        if (!agent) continue;

        if (agent.spawning) {
          stats.skippedSpawning++;
          continue;
        }

        stats.processed++;
        try {
          this.processAgent(locked, world, agent, stats);
        } catch (error) {
          stats.failures++;
          this.handleAgentFailure(locked, agentId, error, tick);
        }
      }

      return stats;
    });
  }

  private processAgent(
    locked: LockedTaskRegistry,
    world: IWorldPort,
    agent: AgentHandle,
    stats: TaskTickStats,
  ): void {
    let entry = locked.entry(agent.name);

    if (entry.state === EntryState.OCCUPIED) {
      const result = this.executor.execute(world, agent, entry);
      if (!result.evict) return;

      if (result.outcome === TaskOutcome.COMPLETED) {
        stats.completed++;
      } else {
        stats.evicted++;
      }
      entry = locked.entry(agent.name);
    }

    if (entry.state === EntryState.VACANT) {
      const task = this.selector.assignTask(entry, world, agent);
      if (task) {
        stats.assigned++;
      } else {
        stats.idle++;
      }
    }
  }

  private handleAgentFailure(
    locked: LockedTaskRegistry,
    agentId: AgentId,
    error: unknown,
    tick: number,
  ): void {
    const message = error instanceof Error ? error.message : String(error);
    logger.agentLog(
      LogLevel.ERROR,
      LogCategory.TASKS,
      agentId,
      `task processing threw: ${message}`,
      { stack: error instanceof Error ? error.stack : undefined },
    );

    const entry = locked.entry(agentId);
    if (entry.state !== EntryState.OCCUPIED) return;

    const task = entry.remove();
    simulationEvents.emitEvent(GameEventType.TASK_EVICTED, {
      agentId,
      task,
      outcome: TaskOutcome.EVICTED,
      tick,
    });
  }
}
