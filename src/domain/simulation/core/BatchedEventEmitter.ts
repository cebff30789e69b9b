import { EventEmitter } from "node:events";
import type { GameEventType } from "../../../shared/constants/EventEnums";
import type { SimulationEventMap } from "../../../shared/types/simulation/events";

/**
 * EventEmitter that queues simulation events during a tick and delivers them
 * in one batch when the runner flushes at the end of the tick.
 */
export class BatchedEventEmitter extends EventEmitter {
  private eventQueue: Array<{ name: GameEventType; payload: unknown }> = [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /**
   * Queues a typed event, or delivers it immediately when batching is off.
   */
  public emitEvent<K extends GameEventType>(
    name: K,
    payload: SimulationEventMap[K],
  ): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }
    this.eventQueue.push({ name, payload });
  }

  /**
   * Subscribes to a typed event.
   */
  public onEvent<K extends GameEventType>(
    name: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }
}
