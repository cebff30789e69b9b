import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every component is a singleton: the task registry in particular must
 * survive from tick to tick, so building a new container is what a process
 * restart means for the engine (empty registry, reseeded RNG).
 *
 * @module config
 */
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { TaskRegistry } from "../domain/simulation/core/TaskRegistry";
import { ReferentResolver } from "../domain/simulation/core/ReferentResolver";
import {
  DEFAULT_TASK_POLICY,
  type TaskPolicy,
} from "../domain/simulation/core/SimulationConstants";
import { simulationEvents } from "../domain/simulation/core/events";
import { loadPopulationThresholds } from "../domain/data/PopulationCatalog";
import type { PopulationThreshold } from "../shared/types/simulation/population";
import { RandomUtils } from "../shared/utils/RandomUtils";
import {
  TaskSelector,
  TaskExecutor,
  TaskSystem,
  PopulationSystem,
  DefenseSystem,
} from "../domain/simulation/systems";

export interface ContainerOptions {
  policy?: TaskPolicy;
  populationThresholds?: readonly PopulationThreshold[];
  rngSeed?: string | number;
}

export function createContainer(options: ContainerOptions = {}): Container {
  const container = new Container();

  RandomUtils.seed(options.rngSeed ?? CONFIG.RNG_SEED);
  simulationEvents.clearQueue();

  container
    .bind<TaskPolicy>(TYPES.TaskPolicy)
    .toConstantValue(options.policy ?? DEFAULT_TASK_POLICY);
  container
    .bind<readonly PopulationThreshold[]>(TYPES.PopulationThresholds)
    .toConstantValue(options.populationThresholds ?? loadPopulationThresholds());

  container
    .bind<TaskRegistry>(TYPES.TaskRegistry)
    .to(TaskRegistry)
    .inSingletonScope();
  container
    .bind<ReferentResolver>(TYPES.ReferentResolver)
    .to(ReferentResolver)
    .inSingletonScope();

  container
    .bind<TaskSelector>(TYPES.TaskSelector)
    .to(TaskSelector)
    .inSingletonScope();
  container
    .bind<TaskExecutor>(TYPES.TaskExecutor)
    .to(TaskExecutor)
    .inSingletonScope();
  container
    .bind<TaskSystem>(TYPES.TaskSystem)
    .to(TaskSystem)
    .inSingletonScope();
  container
    .bind<PopulationSystem>(TYPES.PopulationSystem)
    .to(PopulationSystem)
    .inSingletonScope();
  container
    .bind<DefenseSystem>(TYPES.DefenseSystem)
    .to(DefenseSystem)
    .inSingletonScope();

  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}

export const container = createContainer();
