import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { ActionResult } from "@/shared/constants/StatusEnums";
import { StructureType } from "@/shared/constants/StructureEnums";
import type { PopulationTickStats } from "@/shared/types/simulation/events";
import type { PopulationThreshold } from "@/shared/types/simulation/population";
import type { Spawn } from "@/shared/types/simulation/world";
import { ownedStructuresOfType } from "@/shared/utils/roomQueries";
import { maxPopulationCeiling } from "../../../data/PopulationCatalog";
import { simulationEvents, GameEventType } from "../../core/events";
import type { IWorldPort } from "../../ports";

/**
 * First row, in ascending ceiling order, whose ceiling is above the current
 * population and whose cost fits in the available energy.
 */
export function selectThreshold(
  thresholds: readonly PopulationThreshold[],
  population: number,
  energyAvailable: number,
): PopulationThreshold | undefined {
  return thresholds.find(
    (row) =>
      row.populationCeiling > population && row.resourceCost <= energyAvailable,
  );
}

/**
 * Decides once per idle spawn whether to produce a new agent.
 *
 * Names are `${tick}-${seq}` where `seq` restarts every tick and only moves
 * on a successful request. A success also counts toward the working
 * population and draws down the room's working energy, so later spawns in the
 * same tick see both. Rejections are logged and retried on a later tick.
 */
@injectable()
export class PopulationSystem {
  private readonly maxCeiling: number;

  constructor(
    @inject(TYPES.PopulationThresholds)
    private readonly thresholds: readonly PopulationThreshold[],
  ) {
    this.maxCeiling = maxPopulationCeiling(thresholds);
  }

  public update(world: IWorldPort): PopulationTickStats {
    const tick = world.getTick();
    const stats: PopulationTickStats = {
      population: world.getAgents().length,
      requested: 0,
      rejected: 0,
    };
    let seq = 0;

    for (const room of world.getRooms()) {
      let energy = room.energyAvailable;

      for (const spawn of ownedStructuresOfType(room, StructureType.SPAWN)) {
        if (stats.population >= this.maxCeiling) return stats;
        if (spawn.spawning) continue;

        const row = selectThreshold(this.thresholds, stats.population, energy);
        if (!row) continue;

        const name = `${tick}-${seq}`;
        const result = this.requestSpawn(spawn, row, name);

        if (result === ActionResult.OK) {
          seq++;
          stats.population++;
          stats.requested++;
          energy -= row.resourceCost;

          logger.info(
            `Spawning ${name} (${row.loadout.length} parts, ${row.resourceCost} energy) at ${spawn.id}`,
            LogCategory.POPULATION,
          );
          simulationEvents.emitEvent(GameEventType.SPAWN_REQUESTED, {
            spawnId: spawn.id,
            name,
            loadout: row.loadout,
            cost: row.resourceCost,
            tick,
          });
        } else {
          stats.rejected++;
          logger.warn(
            `Spawn ${spawn.id} rejected ${name}: ${result}`,
            LogCategory.POPULATION,
          );
          simulationEvents.emitEvent(GameEventType.SPAWN_REJECTED, {
            spawnId: spawn.id,
            name,
            result,
            tick,
          });
        }
      }
    }

    return stats;
  }

  public getMaxPopulation(): number {
    return this.maxCeiling;
  }

  private requestSpawn(
    spawn: Spawn,
    row: PopulationThreshold,
    name: string,
  ): ActionResult {
    try {
      return spawn.spawnCreep(row.loadout, name);
    } catch (error) {
      logger.error(
        `spawnCreep threw at ${spawn.id}: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.POPULATION,
      );
      return ActionResult.INVALID_ARGS;
    }
  }
}
