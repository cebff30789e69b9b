/**
 * Host world types.
 *
 * Every object here is a live, tick-scoped handle supplied by the host: it is
 * valid only during the tick it was obtained in. Tasks never keep these; they
 * keep ids (see `tasks.ts`) and re-resolve them through `IWorldPort`.
 *
 * @module shared/types/simulation/world
 */

import type {
  ObjectType,
  ResourceType,
  StoreTargetKind,
  StructureType,
  Terrain,
} from "../../constants/StructureEnums";
import type { ActionResult } from "../../constants/StatusEnums";
import type { BodyPart } from "../../constants/BodyPartEnums";

export type ObjectId = string;

/** Agent name, unique for the lifetime of the process. */
export type AgentId = string;

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly roomName: string;
}

/**
 * Capacity query over a single-resource store.
 */
export interface ResourceStore {
  getUsedCapacity(resource: ResourceType): number;
  getFreeCapacity(resource: ResourceType): number;
  getCapacity(resource: ResourceType): number;
}

interface RoomObjectBase {
  readonly id: ObjectId;
  readonly pos: Position;
}

export interface Source extends RoomObjectBase {
  readonly objectType: ObjectType.SOURCE;
  readonly energy: number;
  readonly energyCapacity: number;
}

export interface ConstructionSite extends RoomObjectBase {
  readonly objectType: ObjectType.CONSTRUCTION_SITE;
  readonly structureType: StructureType;
  readonly progress: number;
  readonly progressTotal: number;
  readonly my: boolean;
}

interface StructureBase<T extends StructureType> extends RoomObjectBase {
  readonly objectType: ObjectType.STRUCTURE;
  readonly structureType: T;
  readonly my: boolean;
}

interface DamageableStructure<T extends StructureType>
  extends StructureBase<T> {
  readonly hits: number;
  readonly hitsMax: number;
}

export interface Controller extends StructureBase<StructureType.CONTROLLER> {
  readonly level: number;
  readonly ticksToDowngrade: number;
}

export interface Spawn extends DamageableStructure<StructureType.SPAWN> {
  readonly store: ResourceStore;
  /** True while a previous spawn order is still in progress. */
  readonly spawning: boolean;
  spawnCreep(body: readonly BodyPart[], name: string): ActionResult;
}

export interface Extension extends DamageableStructure<StructureType.EXTENSION> {
  readonly store: ResourceStore;
}

export interface Tower extends DamageableStructure<StructureType.TOWER> {
  readonly store: ResourceStore;
  attack(target: HostileAgent): ActionResult;
}

export type Road = DamageableStructure<StructureType.ROAD>;

export type PassiveStructure = DamageableStructure<
  StructureType.CONTAINER | StructureType.WALL | StructureType.RAMPART
>;

export type Structure =
  | Controller
  | Spawn
  | Extension
  | Tower
  | Road
  | PassiveStructure;

/** Structures that carry hit points and accept a repair action. */
export type RepairableStructure = Exclude<Structure, Controller>;

/** Structures that accept an energy transfer. */
export type StoreTarget = Extract<Structure, { structureType: StoreTargetKind }>;

export type RoomObject = Source | ConstructionSite | Structure;

export interface MoveOptions {
  /** Number of ticks the host may reuse a cached path for. */
  readonly reusePath: number;
}

/**
 * One of the player's own agents.
 */
export interface AgentHandle {
  readonly name: AgentId;
  readonly pos: Position;
  /** Agents still being spawned cannot act and are skipped. */
  readonly spawning: boolean;
  readonly store: ResourceStore;

  moveTo(target: Position, options: MoveOptions): ActionResult;
  harvest(source: Source): ActionResult;
  build(site: ConstructionSite): ActionResult;
  transfer(target: StoreTarget, resource: ResourceType): ActionResult;
  repair(target: RepairableStructure): ActionResult;
  upgradeController(controller: Controller): ActionResult;
}

export interface HostileAgent {
  readonly id: ObjectId;
  readonly pos: Position;
  readonly owner: string;
  readonly hits: number;
}

/**
 * Per-room view of the world for the current tick.
 */
export interface RoomSnapshot {
  readonly name: string;
  readonly energyAvailable: number;
  readonly energyCapacityAvailable: number;
  readonly structures: readonly Structure[];
  readonly constructionSites: readonly ConstructionSite[];
  /** Sources that currently hold energy. */
  readonly activeSources: readonly Source[];
  readonly hostiles: readonly HostileAgent[];
  terrainAt(x: number, y: number): Terrain;
}
