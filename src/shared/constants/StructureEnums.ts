/**
 * World object enumerations mirrored from the host.
 *
 * @module shared/constants/StructureEnums
 */

/**
 * Top-level kind of a room object.
 */
export enum ObjectType {
  SOURCE = "source",
  CONSTRUCTION_SITE = "construction_site",
  STRUCTURE = "structure",
}

/**
 * Structure kinds the engine knows about.
 */
export enum StructureType {
  CONTROLLER = "controller",
  SPAWN = "spawn",
  EXTENSION = "extension",
  TOWER = "tower",
  ROAD = "road",
  CONTAINER = "container",
  WALL = "constructedWall",
  RAMPART = "rampart",
}

/**
 * Structures an agent can transfer energy into. Adding a kind here widens
 * `StoreTarget` and `StoreTargetRef`; every switch over them must follow.
 */
export const STORE_TARGET_KINDS = [
  StructureType.SPAWN,
  StructureType.EXTENSION,
  StructureType.TOWER,
] as const satisfies readonly StructureType[];

export type StoreTargetKind = (typeof STORE_TARGET_KINDS)[number];

/**
 * Terrain classification of a room tile.
 */
export enum Terrain {
  PLAIN = "plain",
  SWAMP = "swamp",
  WALL = "wall",
}

/**
 * Resources the engine tracks in agent and structure stores.
 */
export enum ResourceType {
  ENERGY = "energy",
}
