/**
 * Port interfaces for the host world.
 *
 * The engine never talks to the game directly: the host implements these
 * contracts and hands an instance to `SimulationRunner.runTick()` every tick.
 * Nothing obtained through a port may be kept past the tick it came from.
 *
 * @module domain/simulation/ports
 */

import type {
  AgentHandle,
  ObjectId,
  RoomObject,
  RoomSnapshot,
} from "@/shared/types/simulation/world";

/**
 * Port for the world as seen during one tick.
 */
export interface IWorldPort {
  /**
   * Monotonically increasing tick counter
   */
  getTick(): number;

  /**
   * CPU consumed so far in this tick (host unit, milliseconds)
   */
  getCpuUsed(): number;

  /**
   * Rooms the player has vision of
   */
  getRooms(): readonly RoomSnapshot[];

  /**
   * Looks up a single room by name
   */
  getRoom(name: string): RoomSnapshot | undefined;

  /**
   * The player's own agents, including ones still spawning
   */
  getAgents(): readonly AgentHandle[];

  /**
   * Resolves a stable id to this tick's live object, if it still exists
   */
  getObjectById(id: ObjectId): RoomObject | undefined;
}
