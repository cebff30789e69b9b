import { Terrain } from "../../../shared/constants/StructureEnums";
import { TaskKind } from "../../../shared/constants/TaskEnums";

/**
 * Gameplay policy of the task engine.
 *
 * These numbers have been tuned by hand more than once; treat them as
 * configuration, not as rules of the world. Everything that reads them takes a
 * `TaskPolicy` through the container so tests and hosts can swap values.
 */
export interface TaskPolicy {
  /** Downgrade timer per controller level, before the margin is applied. */
  readonly controllerDangerTicks: Readonly<Record<number, number>>;
  /** Subtracted from `controllerDangerTicks[level]` to get the danger line. */
  readonly controllerDangerMargin: number;
  /** Full road durability per terrain under the road. */
  readonly roadRepairHits: Readonly<Record<Terrain, number>>;
  /** Roads are repaired below `roadRepairHits[terrain] * factor`. */
  readonly roadRepairSafetyFactor: number;
  /** Maximum tile range of each task's terminal action. */
  readonly actionRange: Readonly<Record<TaskKind, number>>;
  /** Path cache lifetime (ticks) handed to `moveTo` per task kind. */
  readonly pathReuse: Readonly<Record<TaskKind, number>>;
  /** Towers ignore hostiles farther than this. */
  readonly towerRange: number;
}

export const DEFAULT_TASK_POLICY: TaskPolicy = {
  controllerDangerTicks: {
    1: 20_000,
    2: 10_000,
    3: 20_000,
    4: 40_000,
    5: 80_000,
    6: 120_000,
    7: 150_000,
    8: 200_000,
  },
  controllerDangerMargin: 5_000,

  roadRepairHits: {
    [Terrain.PLAIN]: 5_000,
    [Terrain.SWAMP]: 25_000,
    [Terrain.WALL]: 750_000,
  },
  roadRepairSafetyFactor: 0.5,

  // contacto (1) vs. acción a distancia (3)
  actionRange: {
    [TaskKind.HARVEST]: 1,
    [TaskKind.STORE]: 1,
    [TaskKind.UPGRADE]: 3,
    [TaskKind.CONSTRUCT]: 3,
    [TaskKind.REPAIR]: 3,
  },

  pathReuse: {
    [TaskKind.HARVEST]: 5,
    [TaskKind.STORE]: 10,
    [TaskKind.REPAIR]: 10,
    [TaskKind.CONSTRUCT]: 15,
    [TaskKind.UPGRADE]: 30,
  },

  towerRange: 50,
};

/**
 * Danger line for a controller level, or `undefined` for levels the table
 * does not cover.
 */
export function controllerDangerThreshold(
  policy: TaskPolicy,
  level: number,
): number | undefined {
  const ticks = policy.controllerDangerTicks[level];
  return ticks === undefined ? undefined : ticks - policy.controllerDangerMargin;
}

/**
 * Hits below which a road on `terrain` gets repaired.
 */
export function roadRepairThreshold(
  policy: TaskPolicy,
  terrain: Terrain,
): number {
  return policy.roadRepairHits[terrain] * policy.roadRepairSafetyFactor;
}
