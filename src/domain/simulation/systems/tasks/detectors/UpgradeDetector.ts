/**
 * @fileoverview Detector de mejora del controlador
 *
 * Dos entradas en la lista de prioridades: el controlador en peligro de
 * degradarse (la más urgente) y el controlador como último recurso.
 *
 * @module domain/simulation/systems/tasks/detectors/UpgradeDetector
 */

import { StructureType } from "@/shared/constants/StructureEnums";
import { upgradeTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import { controllerDangerThreshold } from "../../../core/SimulationConstants";
import type { DetectorContext } from "../types";
import { ownedStructuresOfType } from "@/shared/utils/roomQueries";

/**
 * Controlador propio cuyo contador de degradación cruzó la línea de peligro
 * de su nivel.
 */
export function detectControllerDanger(
  ctx: DetectorContext,
): TaskHandle | undefined {
  const controller = ownedStructuresOfType(ctx.room, StructureType.CONTROLLER).find(
    (candidate) => {
      const threshold = controllerDangerThreshold(ctx.policy, candidate.level);
      return threshold !== undefined && candidate.ticksToDowngrade < threshold;
    },
  );
  return controller && upgradeTask(controller);
}

/**
 * Cualquier controlador propio.
 */
export function detectFallbackUpgrade(
  ctx: DetectorContext,
): TaskHandle | undefined {
  const [controller] = ownedStructuresOfType(ctx.room, StructureType.CONTROLLER);
  return controller && upgradeTask(controller);
}
