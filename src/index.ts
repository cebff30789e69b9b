import "reflect-metadata";
import type { Container } from "inversify";
import { TYPES } from "./config/Types";
import { container, createContainer } from "./config/container";
import type { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
import type { IWorldPort } from "./domain/simulation/ports";
import type { TickReport } from "./shared/types/simulation/events";

let activeContainer: Container = container;

/**
 * Host entry point, called once per tick.
 */
export function loop(world: IWorldPort): TickReport {
  return activeContainer
    .get<SimulationRunner>(TYPES.SimulationRunner)
    .runTick(world);
}

/**
 * Drops all engine state as a process restart would: empty task registry and
 * a freshly seeded random generator.
 */
export function restart(): void {
  activeContainer = createContainer();
}

export { createContainer, type ContainerOptions } from "./config/container";
export { TYPES } from "./config/Types";
export { CONFIG } from "./config/config";
export { logger, Logger } from "./infrastructure/utils/logger";
export { simulationEvents } from "./domain/simulation/core/events";
export { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
export { TaskRegistry } from "./domain/simulation/core/TaskRegistry";
export { TickTimer } from "./domain/simulation/core/TickTimer";
export {
  DEFAULT_TASK_POLICY,
  type TaskPolicy,
} from "./domain/simulation/core/SimulationConstants";
export {
  loadPopulationThresholds,
  parsePopulationThresholds,
} from "./domain/data/PopulationCatalog";
export type { IWorldPort } from "./domain/simulation/ports";
export * from "./shared/constants/StatusEnums";
export * from "./shared/constants/TaskEnums";
export * from "./shared/constants/StructureEnums";
export * from "./shared/constants/BodyPartEnums";
export * from "./shared/constants/EventEnums";
export type * from "./shared/types/simulation/world";
export * from "./shared/types/simulation/tasks";
export type * from "./shared/types/simulation/events";
export type * from "./shared/types/simulation/population";
