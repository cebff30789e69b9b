import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { ActionResult } from "@/shared/constants/StatusEnums";
import { StructureType } from "@/shared/constants/StructureEnums";
import type { DefenseTickStats } from "@/shared/types/simulation/events";
import type { HostileAgent, Tower } from "@/shared/types/simulation/world";
import { findClosestByRange } from "@/shared/utils/mathUtils";
import { ownedStructuresOfType } from "@/shared/utils/roomQueries";
import type { TaskPolicy } from "../../core/SimulationConstants";
import { simulationEvents, GameEventType } from "../../core/events";
import type { IWorldPort } from "../../ports";

/**
 * Stateless tower targeting, run first in every tick: each owned tower fires
 * at the nearest hostile within `towerRange`.
 */
@injectable()
export class DefenseSystem {
  constructor(
    @inject(TYPES.TaskPolicy) private readonly policy: TaskPolicy,
  ) {}

  public update(world: IWorldPort): DefenseTickStats {
    const tick = world.getTick();
    const stats: DefenseTickStats = { towers: 0, attacks: 0, failures: 0 };

    for (const room of world.getRooms()) {
      for (const tower of ownedStructuresOfType(room, StructureType.TOWER)) {
        stats.towers++;
        const target = findClosestByRange(
          tower.pos,
          room.hostiles,
          this.policy.towerRange,
        );
        if (!target) continue;

        const result = this.fire(tower, target);
        if (result === ActionResult.OK) {
          stats.attacks++;
        } else {
          stats.failures++;
          logger.warn(
            `Tower ${tower.id} failed to attack ${target.id}: ${result}`,
            LogCategory.COMBAT,
          );
        }

        simulationEvents.emitEvent(GameEventType.TOWER_ATTACK, {
          towerId: tower.id,
          targetId: target.id,
          result,
          tick,
        });
      }
    }

    return stats;
  }

  private fire(tower: Tower, target: HostileAgent): ActionResult {
    try {
      return tower.attack(target);
    } catch (error) {
      logger.error(
        `Tower ${tower.id} attack threw: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.COMBAT,
      );
      return ActionResult.INVALID_TARGET;
    }
  }
}
