/**
 * Payloads of the simulation events, keyed by event name.
 *
 * @module shared/types/simulation/events
 */

import type { GameEventType } from "../../constants/EventEnums";
import type { ActionResult, ErrorKind } from "../../constants/StatusEnums";
import type { BodyPart } from "../../constants/BodyPartEnums";
import type { TaskOutcome } from "../../constants/TaskEnums";
import type { TaskHandle } from "./tasks";
import type { AgentId, ObjectId } from "./world";

export interface TaskTickStats {
  processed: number;
  skippedSpawning: number;
  assigned: number;
  /** Single-shot tasks that finished and left the registry. */
  completed: number;
  evicted: number;
  idle: number;
  failures: number;
  pruned: number;
}

export interface PopulationTickStats {
  population: number;
  requested: number;
  rejected: number;
}

export interface DefenseTickStats {
  towers: number;
  attacks: number;
  failures: number;
}

/**
 * Summary of one tick, also logged by the runner.
 */
export interface TickReport {
  tick: number;
  /** CPU spent since the tick started, in the host's CPU unit (ms). */
  cpuUsed: number;
  overBudget: boolean;
  defense: DefenseTickStats;
  tasks: TaskTickStats;
  population: PopulationTickStats;
}

export interface SimulationEventMap {
  [GameEventType.TASK_ASSIGNED]: {
    agentId: AgentId;
    task: TaskHandle;
    tick: number;
  };
  [GameEventType.TASK_EVICTED]: {
    agentId: AgentId;
    task: TaskHandle;
    outcome: TaskOutcome;
    reason?: ErrorKind;
    tick: number;
  };
  [GameEventType.AGENT_IDLE]: {
    agentId: AgentId;
    tick: number;
  };
  [GameEventType.AGENTS_PRUNED]: {
    agentIds: AgentId[];
    tick: number;
  };
  [GameEventType.SPAWN_REQUESTED]: {
    spawnId: ObjectId;
    name: AgentId;
    loadout: readonly BodyPart[];
    cost: number;
    tick: number;
  };
  [GameEventType.SPAWN_REJECTED]: {
    spawnId: ObjectId;
    name: AgentId;
    result: ActionResult;
    tick: number;
  };
  [GameEventType.TOWER_ATTACK]: {
    towerId: ObjectId;
    targetId: ObjectId;
    result: ActionResult;
    tick: number;
  };
  [GameEventType.TICK_COMPLETED]: TickReport;
}
