import { ResourceType, StructureType } from "../constants/StructureEnums";
import type {
  RoomSnapshot,
  StoreTarget,
  Structure,
} from "../types/simulation/world";

export type StructureOf<T extends StructureType> = Extract<
  Structure,
  { structureType: T }
>;

/**
 * Estructuras de la sala de un tipo concreto, en el orden del snapshot.
 */
export function structuresOfType<T extends StructureType>(
  room: RoomSnapshot,
  type: T,
): StructureOf<T>[] {
  return room.structures.filter(
    (structure): structure is StructureOf<T> => structure.structureType === type,
  );
}

/**
 * Igual que `structuresOfType` pero solo las propias.
 */
export function ownedStructuresOfType<T extends StructureType>(
  room: RoomSnapshot,
  type: T,
): StructureOf<T>[] {
  return structuresOfType(room, type).filter((structure) => structure.my);
}

export function hasFreeEnergyCapacity(target: StoreTarget): boolean {
  return target.store.getFreeCapacity(ResourceType.ENERGY) > 0;
}
