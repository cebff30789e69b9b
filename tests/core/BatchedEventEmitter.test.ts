import { describe, it, expect, beforeEach, vi } from "vitest";
import { BatchedEventEmitter } from "../../src/domain/simulation/core/BatchedEventEmitter";
import { GameEventType } from "../../src/shared/constants/EventEnums";

describe("BatchedEventEmitter", () => {
  let emitter: BatchedEventEmitter;
  const idle = { agentId: "a", tick: 7 };

  beforeEach(() => {
    emitter = new BatchedEventEmitter();
  });

  describe("emitEvent", () => {
    it("debe encolar evento cuando batching habilitado", () => {
      const listener = vi.fn();
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);

      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);

      expect(listener).not.toHaveBeenCalled();
      expect(emitter.getQueueSize()).toBe(1);

      emitter.flushEvents();
      expect(listener).toHaveBeenCalledWith(idle);
    });

    it("debe emitir inmediatamente cuando batching deshabilitado", () => {
      const listener = vi.fn();
      emitter.setBatchingEnabled(false);
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);

      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);

      expect(listener).toHaveBeenCalledWith(idle);
      expect(emitter.getQueueSize()).toBe(0);
    });
  });

  describe("flushEvents", () => {
    it("debe entregar los eventos en orden de emisión", () => {
      const order: string[] = [];
      emitter.onEvent(GameEventType.AGENT_IDLE, (payload) => order.push(`idle:${payload.agentId}`));
      emitter.onEvent(GameEventType.AGENTS_PRUNED, (payload) =>
        order.push(`pruned:${payload.agentIds.join(",")}`),
      );

      emitter.emitEvent(GameEventType.AGENT_IDLE, { agentId: "a", tick: 1 });
      emitter.emitEvent(GameEventType.AGENTS_PRUNED, { agentIds: ["x", "y"], tick: 1 });
      emitter.emitEvent(GameEventType.AGENT_IDLE, { agentId: "b", tick: 1 });
      emitter.flushEvents();

      expect(order).toEqual(["idle:a", "pruned:x,y", "idle:b"]);
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("debe volver a encolar lo emitido después del flush", () => {
      const listener = vi.fn();
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);
      emitter.flushEvents();

      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);
      expect(listener).not.toHaveBeenCalled();
    });

    it("no debe hacer nada si cola vacía", () => {
      const listener = vi.fn();
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);
      emitter.flushEvents();
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("setBatchingEnabled", () => {
    it("debe vaciar la cola al deshabilitar", () => {
      const listener = vi.fn();
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);
      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);

      emitter.setBatchingEnabled(false);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(emitter.getQueueSize()).toBe(0);
    });
  });

  describe("onEvent", () => {
    it("debe devolver una función para desuscribirse", () => {
      const listener = vi.fn();
      const unsubscribe = emitter.onEvent(GameEventType.AGENT_IDLE, listener);
      unsubscribe();

      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);
      emitter.flushEvents();
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("clearQueue", () => {
    it("debe descartar los eventos pendientes", () => {
      const listener = vi.fn();
      emitter.onEvent(GameEventType.AGENT_IDLE, listener);
      emitter.emitEvent(GameEventType.AGENT_IDLE, idle);

      emitter.clearQueue();
      emitter.flushEvents();

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
