import { vi } from "vitest";
import type { IWorldPort } from "../src/domain/simulation/ports";
import { ActionResult } from "../src/shared/constants/StatusEnums";
import {
  ObjectType,
  StructureType,
  Terrain,
} from "../src/shared/constants/StructureEnums";
import type { BodyPart } from "../src/shared/constants/BodyPartEnums";
import type {
  AgentHandle,
  ConstructionSite,
  Controller,
  Extension,
  HostileAgent,
  MoveOptions,
  Position,
  RepairableStructure,
  ResourceStore,
  Road,
  RoomObject,
  RoomSnapshot,
  Source,
  Spawn,
  StoreTarget,
  Structure,
  Tower,
} from "../src/shared/types/simulation/world";

export const ROOM = "W1N1";

export function pos(x: number, y: number, roomName: string = ROOM): Position {
  return { x, y, roomName };
}

/**
 * Energy store whose contents tests can change between ticks.
 */
export class FakeStore implements ResourceStore {
  constructor(
    public used: number,
    public capacity: number,
  ) {}

  getUsedCapacity(): number {
    return this.used;
  }

  getFreeCapacity(): number {
    return this.capacity - this.used;
  }

  getCapacity(): number {
    return this.capacity;
  }
}

export interface FakeAgentOptions {
  name: string;
  at?: Position;
  energy?: number;
  capacity?: number;
  spawning?: boolean;
}

export type FakeAgent = ReturnType<typeof createAgent>;

/**
 * Agent whose directives are `vi.fn` mocks returning OK by default.
 */
export function createAgent(options: FakeAgentOptions) {
  const store = new FakeStore(options.energy ?? 0, options.capacity ?? 50);
  const agent = {
    name: options.name,
    pos: options.at ?? pos(25, 25),
    spawning: options.spawning ?? false,
    store,
    moveTo: vi.fn((_target: Position, _options: MoveOptions): ActionResult => ActionResult.OK),
    harvest: vi.fn((_source: Source): ActionResult => ActionResult.OK),
    build: vi.fn((_site: ConstructionSite): ActionResult => ActionResult.OK),
    transfer: vi.fn((_target: StoreTarget, _resource: string): ActionResult => ActionResult.OK),
    repair: vi.fn((_target: RepairableStructure): ActionResult => ActionResult.OK),
    upgradeController: vi.fn((_controller: Controller): ActionResult => ActionResult.OK),
  } satisfies AgentHandle;
  return agent;
}

export function createSource(id: string, at: Position, energy = 3000): Source {
  return {
    id,
    pos: at,
    objectType: ObjectType.SOURCE,
    energy,
    energyCapacity: 3000,
  };
}

export function createController(
  id: string,
  at: Position,
  level: number,
  ticksToDowngrade: number,
  my = true,
): Controller {
  return {
    id,
    pos: at,
    objectType: ObjectType.STRUCTURE,
    structureType: StructureType.CONTROLLER,
    my,
    level,
    ticksToDowngrade,
  };
}

export type FakeSpawn = ReturnType<typeof createSpawn>;

export function createSpawn(
  id: string,
  at: Position,
  options: { energy?: number; capacity?: number; spawning?: boolean; my?: boolean } = {},
) {
  const spawn = {
    id,
    pos: at,
    objectType: ObjectType.STRUCTURE,
    structureType: StructureType.SPAWN,
    my: options.my ?? true,
    hits: 5000,
    hitsMax: 5000,
    store: new FakeStore(options.energy ?? 300, options.capacity ?? 300),
    spawning: options.spawning ?? false,
    spawnCreep: vi.fn((_body: readonly BodyPart[], _name: string): ActionResult => ActionResult.OK),
  } satisfies Spawn;
  return spawn;
}

export function createExtension(
  id: string,
  at: Position,
  energy: number,
  capacity = 50,
): Extension {
  return {
    id,
    pos: at,
    objectType: ObjectType.STRUCTURE,
    structureType: StructureType.EXTENSION,
    my: true,
    hits: 1000,
    hitsMax: 1000,
    store: new FakeStore(energy, capacity),
  };
}

export type FakeTower = ReturnType<typeof createTower>;

export function createTower(
  id: string,
  at: Position,
  options: { energy?: number; my?: boolean } = {},
) {
  const tower = {
    id,
    pos: at,
    objectType: ObjectType.STRUCTURE,
    structureType: StructureType.TOWER,
    my: options.my ?? true,
    hits: 3000,
    hitsMax: 3000,
    store: new FakeStore(options.energy ?? 1000, 1000),
    attack: vi.fn((_target: HostileAgent): ActionResult => ActionResult.OK),
  } satisfies Tower;
  return tower;
}

export function createRoad(id: string, at: Position, hits: number): Road {
  return {
    id,
    pos: at,
    objectType: ObjectType.STRUCTURE,
    structureType: StructureType.ROAD,
    my: false,
    hits,
    hitsMax: 5000,
  };
}

export function createSite(id: string, at: Position, my = true): ConstructionSite {
  return {
    id,
    pos: at,
    objectType: ObjectType.CONSTRUCTION_SITE,
    structureType: StructureType.EXTENSION,
    progress: 0,
    progressTotal: 3000,
    my,
  };
}

export function createHostile(id: string, at: Position): HostileAgent {
  return { id, pos: at, owner: "invader", hits: 100 };
}

export interface FakeRoomOptions {
  name?: string;
  energyAvailable?: number;
  energyCapacityAvailable?: number;
  structures?: Structure[];
  constructionSites?: ConstructionSite[];
  sources?: Source[];
  hostiles?: HostileAgent[];
  terrain?: (x: number, y: number) => Terrain;
}

/**
 * Mutable room: tests push and remove objects between ticks.
 */
export class FakeRoom implements RoomSnapshot {
  readonly name: string;
  energyAvailable: number;
  energyCapacityAvailable: number;
  structures: Structure[];
  constructionSites: ConstructionSite[];
  sources: Source[];
  hostiles: HostileAgent[];
  private readonly terrain: (x: number, y: number) => Terrain;

  constructor(options: FakeRoomOptions = {}) {
    this.name = options.name ?? ROOM;
    this.energyAvailable = options.energyAvailable ?? 300;
    this.energyCapacityAvailable = options.energyCapacityAvailable ?? 300;
    this.structures = options.structures ?? [];
    this.constructionSites = options.constructionSites ?? [];
    this.sources = options.sources ?? [];
    this.hostiles = options.hostiles ?? [];
    this.terrain = options.terrain ?? (() => Terrain.PLAIN);
  }

  get activeSources(): Source[] {
    return this.sources.filter((source) => source.energy > 0);
  }

  terrainAt(x: number, y: number): Terrain {
    return this.terrain(x, y);
  }

  objects(): RoomObject[] {
    return [...this.structures, ...this.constructionSites, ...this.sources];
  }

  remove(id: string): void {
    this.structures = this.structures.filter((object) => object.id !== id);
    this.constructionSites = this.constructionSites.filter((object) => object.id !== id);
    this.sources = this.sources.filter((object) => object.id !== id);
  }
}

/**
 * In-process stand-in for the host world. The CPU clock advances by
 * `cpuPerRead` every time it is read.
 */
export class FakeWorld implements IWorldPort {
  tick = 1;
  cpu = 0;
  cpuPerRead = 0;
  rooms: FakeRoom[];
  agents: AgentHandle[];

  constructor(rooms: FakeRoom[] = [new FakeRoom()], agents: AgentHandle[] = []) {
    this.rooms = rooms;
    this.agents = agents;
  }

  getTick(): number {
    return this.tick;
  }

  getCpuUsed(): number {
    this.cpu += this.cpuPerRead;
    return this.cpu;
  }

  getRooms(): readonly RoomSnapshot[] {
    return this.rooms;
  }

  getRoom(name: string): RoomSnapshot | undefined {
    return this.rooms.find((room) => room.name === name);
  }

  getAgents(): readonly AgentHandle[] {
    return this.agents;
  }

  getObjectById(id: string): RoomObject | undefined {
    for (const room of this.rooms) {
      const found = room.objects().find((object) => object.id === id);
      if (found) return found;
    }
    return undefined;
  }

  removeAgent(name: string): void {
    this.agents = this.agents.filter((agent) => agent.name !== name);
  }

  nextTick(): void {
    this.tick++;
    this.cpu = 0;
  }
}
