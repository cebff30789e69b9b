import { BatchedEventEmitter } from "./BatchedEventEmitter";
import { GameEventType } from "../../../shared/constants/EventEnums";

/**
 * Global event emitter for simulation events.
 * Events queue up during a tick and are delivered when the runner flushes.
 *
 * @see BatchedEventEmitter for batching behavior
 */
export const simulationEvents = new BatchedEventEmitter();

export { GameEventType };
