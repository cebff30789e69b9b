/**
 * @fileoverview Exportaciones de Detectores
 *
 * Cada detector es una función pura: (DetectorContext) => TaskHandle | undefined
 *
 * @module domain/simulation/systems/tasks/detectors
 */

export { detectControllerDanger, detectFallbackUpgrade } from "./UpgradeDetector";
export {
  detectSpawnRefill,
  detectExtensionRefill,
  detectTowerRefill,
} from "./StoreDetector";
export { detectRoadRepair } from "./RepairDetector";
export { detectConstruction } from "./ConstructDetector";
export { detectHarvest } from "./HarvestDetector";

import type { TaskHandle } from "@/shared/types/simulation/tasks";
import type { Detector, DetectorContext } from "../types";
import { detectControllerDanger, detectFallbackUpgrade } from "./UpgradeDetector";
import {
  detectSpawnRefill,
  detectExtensionRefill,
  detectTowerRefill,
} from "./StoreDetector";
import { detectRoadRepair } from "./RepairDetector";
import { detectConstruction } from "./ConstructDetector";
import { detectHarvest } from "./HarvestDetector";

/**
 * Lista ordenada para agentes que llevan energía.
 *
 * El orden importa:
 * 1. Controlador a punto de degradarse
 * 2. Spawn
 * 3. Extensiones
 * 4. Torres
 * 5. Carreteras dañadas
 * 6. Obras
 * 7. Controlador (último recurso)
 */
export const CARRYING_DETECTORS: readonly Detector[] = [
  detectControllerDanger,
  detectSpawnRefill,
  detectExtensionRefill,
  detectTowerRefill,
  detectRoadRepair,
  detectConstruction,
  detectFallbackUpgrade,
];

/**
 * Lista para agentes vacíos
 */
export const EMPTY_DETECTORS: readonly Detector[] = [detectHarvest];

/**
 * Ejecuta los detectores en orden y devuelve la primera tarea propuesta
 */
export function runDetectors(
  ctx: DetectorContext,
  detectors: readonly Detector[] = ctx.carriedEnergy > 0
    ? CARRYING_DETECTORS
    : EMPTY_DETECTORS,
): TaskHandle | undefined {
  for (const detector of detectors) {
    const task = detector(ctx);
    if (task) return task;
  }
  return undefined;
}
