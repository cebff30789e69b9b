/**
 * Population threshold table types.
 *
 * @module shared/types/simulation/population
 */

import type { BodyPart } from "../../constants/BodyPartEnums";

/**
 * One row of the population table. Rows are evaluated in ascending
 * `populationCeiling` order; `resourceCost` is the total cost of `loadout`.
 */
export interface PopulationThreshold {
  readonly populationCeiling: number;
  readonly resourceCost: number;
  readonly loadout: readonly BodyPart[];
}
