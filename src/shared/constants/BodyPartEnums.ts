/**
 * Agent body part enumerations and their spawn costs.
 *
 * @module shared/constants/BodyPartEnums
 */

export enum BodyPart {
  MOVE = "move",
  WORK = "work",
  CARRY = "carry",
  ATTACK = "attack",
  RANGED_ATTACK = "ranged_attack",
  HEAL = "heal",
  TOUGH = "tough",
  CLAIM = "claim",
}

/**
 * Energy cost of each part.
 */
export const BODYPART_COST: Readonly<Record<BodyPart, number>> = {
  [BodyPart.MOVE]: 50,
  [BodyPart.WORK]: 100,
  [BodyPart.CARRY]: 50,
  [BodyPart.ATTACK]: 80,
  [BodyPart.RANGED_ATTACK]: 150,
  [BodyPart.HEAL]: 250,
  [BodyPart.TOUGH]: 10,
  [BodyPart.CLAIM]: 600,
};

export function isBodyPart(value: string): value is BodyPart {
  const known: readonly string[] = Object.values(BodyPart);
  return known.includes(value);
}

/**
 * Total energy needed to spawn a loadout.
 */
export function loadoutCost(parts: readonly BodyPart[]): number {
  return parts.reduce((sum, part) => sum + BODYPART_COST[part], 0);
}
