/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  TaskPolicy: Symbol.for("TaskPolicy"),
  PopulationThresholds: Symbol.for("PopulationThresholds"),

  TaskRegistry: Symbol.for("TaskRegistry"),
  ReferentResolver: Symbol.for("ReferentResolver"),
  TaskSelector: Symbol.for("TaskSelector"),
  TaskExecutor: Symbol.for("TaskExecutor"),
  TaskSystem: Symbol.for("TaskSystem"),
  PopulationSystem: Symbol.for("PopulationSystem"),
  DefenseSystem: Symbol.for("DefenseSystem"),
};
