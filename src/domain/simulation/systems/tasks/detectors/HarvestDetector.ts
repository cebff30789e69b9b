/**
 * @fileoverview Detector de recolección
 *
 * Solo para agentes sin energía. Elige entre las fuentes activas con dos
 * sorteos uniformes independientes y se queda con el índice mayor, lo que
 * reparte a los agentes de forma sesgada hacia el final de la lista.
 *
 * @module domain/simulation/systems/tasks/detectors/HarvestDetector
 */

import { harvestTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import type { DetectorContext } from "../types";

export function detectHarvest(ctx: DetectorContext): TaskHandle | undefined {
  const sources = ctx.room.activeSources.filter((source) => source.energy > 0);
  const index = RandomUtils.biasedHighIndex(sources.length);
  if (index === undefined) return undefined;

  const source = sources[index];
  return source && harvestTask(source);
}
