/**
 * @fileoverview Detectores de recarga de energía
 *
 * Spawn, extensiones y torres con capacidad libre, en ese orden de prioridad.
 * Entre varias candidatas gana la más cercana al agente.
 *
 * @module domain/simulation/systems/tasks/detectors/StoreDetector
 */

import type { StoreTargetKind } from "@/shared/constants/StructureEnums";
import { StructureType } from "@/shared/constants/StructureEnums";
import { storeTask } from "@/shared/types/simulation/tasks";
import { findClosestByRange } from "@/shared/utils/mathUtils";
import type { Detector } from "../types";
import { hasFreeEnergyCapacity, ownedStructuresOfType } from "@/shared/utils/roomQueries";

function storeDetectorFor(kind: StoreTargetKind): Detector {
  return (ctx) => {
    const candidates = ownedStructuresOfType(ctx.room, kind).filter(
      hasFreeEnergyCapacity,
    );
    const target = findClosestByRange(ctx.agent.pos, candidates);
    return target && storeTask(target);
  };
}

export const detectSpawnRefill = storeDetectorFor(StructureType.SPAWN);
export const detectExtensionRefill = storeDetectorFor(StructureType.EXTENSION);
export const detectTowerRefill = storeDetectorFor(StructureType.TOWER);
