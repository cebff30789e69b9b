/**
 * Task enumerations for the task engine.
 *
 * @module shared/constants/TaskEnums
 */

/**
 * Kinds of task an agent can hold in the registry.
 */
export enum TaskKind {
  UPGRADE = "upgrade",
  HARVEST = "harvest",
  CONSTRUCT = "construct",
  REPAIR = "repair",
  STORE = "store",
}

/**
 * What happened to an agent's task during one tick.
 */
export enum TaskOutcome {
  /** Terminal action succeeded; the task continues next tick. */
  WORKED = "worked",
  /** Single-shot task finished and was evicted. */
  COMPLETED = "completed",
  /** Agent moved towards the target; the task continues. */
  MOVING = "moving",
  /** Task was evicted (see the attached ErrorKind). */
  EVICTED = "evicted",
  /** A fresh task was inserted by the selector. */
  ASSIGNED = "assigned",
  /** No task could be selected. */
  IDLE = "idle",
}

/**
 * Registry entry state returned by TaskRegistry.entry().
 */
export enum EntryState {
  OCCUPIED = "occupied",
  VACANT = "vacant",
}
