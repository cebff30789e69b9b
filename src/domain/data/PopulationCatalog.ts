import rawThresholds from "./populationThresholds.json";
import {
  isBodyPart,
  loadoutCost,
} from "../../shared/constants/BodyPartEnums";
import type { BodyPart } from "../../shared/constants/BodyPartEnums";
import type { PopulationThreshold } from "../../shared/types/simulation/population";

/**
 * Raw row as it appears in `populationThresholds.json`.
 */
export interface RawPopulationThreshold {
  populationCeiling: number;
  resourceCost: number;
  loadout: readonly string[];
}

/**
 * Validates a population table and returns it typed.
 *
 * Rows must be sorted by strictly ascending `populationCeiling`, every loadout
 * part must be a known body part, and `resourceCost` must equal the sum of the
 * part costs. Any violation throws: a bad table is a deployment error.
 */
export function parsePopulationThresholds(
  rows: readonly RawPopulationThreshold[],
): PopulationThreshold[] {
  if (rows.length === 0) {
    throw new Error("Population table must contain at least one row");
  }

  const parsed: PopulationThreshold[] = [];
  let previousCeiling = 0;

  rows.forEach((row, index) => {
    if (!Number.isInteger(row.populationCeiling) || row.populationCeiling <= 0) {
      throw new Error(
        `Population row ${index}: ceiling must be a positive integer, got ${row.populationCeiling}`,
      );
    }
    if (row.populationCeiling <= previousCeiling) {
      throw new Error(
        `Population row ${index}: ceilings must be strictly ascending (${row.populationCeiling} after ${previousCeiling})`,
      );
    }
    if (row.loadout.length === 0) {
      throw new Error(`Population row ${index}: loadout is empty`);
    }

    const loadout: BodyPart[] = [];
    for (const part of row.loadout) {
      if (!isBodyPart(part)) {
        throw new Error(`Population row ${index}: unknown body part "${part}"`);
      }
      loadout.push(part);
    }

    const expected = loadoutCost(loadout);
    if (row.resourceCost !== expected) {
      throw new Error(
        `Population row ${index}: resourceCost ${row.resourceCost} does not match loadout cost ${expected}`,
      );
    }

    previousCeiling = row.populationCeiling;
    parsed.push({
      populationCeiling: row.populationCeiling,
      resourceCost: row.resourceCost,
      loadout,
    });
  });

  return parsed;
}

/**
 * Default population table shipped with the engine.
 */
export function loadPopulationThresholds(): PopulationThreshold[] {
  return parsePopulationThresholds(rawThresholds);
}

/**
 * Largest ceiling in the table; no spawning happens at or above it.
 */
export function maxPopulationCeiling(
  thresholds: readonly PopulationThreshold[],
): number {
  return thresholds.reduce(
    (max, row) => Math.max(max, row.populationCeiling),
    0,
  );
}
