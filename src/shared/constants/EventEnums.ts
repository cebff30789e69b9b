/**
 * Simulation event names emitted through `simulationEvents`.
 *
 * @module shared/constants/EventEnums
 */

export enum GameEventType {
  TASK_ASSIGNED = "task_assigned",
  TASK_EVICTED = "task_evicted",
  AGENT_IDLE = "agent_idle",
  AGENTS_PRUNED = "agents_pruned",
  SPAWN_REQUESTED = "spawn_requested",
  SPAWN_REJECTED = "spawn_rejected",
  TOWER_ATTACK = "tower_attack",
  TICK_COMPLETED = "tick_completed",
}

