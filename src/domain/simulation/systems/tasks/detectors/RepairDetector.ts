import { StructureType } from "@/shared/constants/StructureEnums";
import { repairTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import { findClosestByRange } from "@/shared/utils/mathUtils";
import { roadRepairThreshold } from "../../../core/SimulationConstants";
import type { DetectorContext } from "../types";
import { structuresOfType } from "@/shared/utils/roomQueries";

/**
 * Carreteras por debajo del umbral de su terreno. Las carreteras no tienen
 * dueño, así que no se filtran por `my`.
 */
export function detectRoadRepair(ctx: DetectorContext): TaskHandle | undefined {
  const damaged = structuresOfType(ctx.room, StructureType.ROAD).filter(
    (road) =>
      road.hits <
      roadRepairThreshold(ctx.policy, ctx.room.terrainAt(road.pos.x, road.pos.y)),
  );
  const road = findClosestByRange(ctx.agent.pos, damaged);
  return road && repairTask(road);
}
