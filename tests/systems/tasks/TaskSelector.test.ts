import { describe, it, expect, beforeEach, vi } from "vitest";
import { TaskSelector } from "../../../src/domain/simulation/systems/tasks/TaskSelector";
import { DEFAULT_TASK_POLICY } from "../../../src/domain/simulation/core/SimulationConstants";
import { TaskRegistry } from "../../../src/domain/simulation/core/TaskRegistry";
import { simulationEvents } from "../../../src/domain/simulation/core/events";
import { GameEventType } from "../../../src/shared/constants/EventEnums";
import { EntryState } from "../../../src/shared/constants/TaskEnums";
import { Terrain } from "../../../src/shared/constants/StructureEnums";
import {
  constructTask,
  harvestTask,
  repairTask,
  storeTask,
  upgradeTask,
} from "../../../src/shared/types/simulation/tasks";
import { RandomUtils } from "../../../src/shared/utils/RandomUtils";
import { logger, LogCategory } from "../../../src/infrastructure/utils/logger";
import {
  FakeRoom,
  FakeWorld,
  createAgent,
  createController,
  createExtension,
  createRoad,
  createSite,
  createSource,
  createSpawn,
  createTower,
  pos,
} from "../../setup";

describe("TaskSelector", () => {
  let selector: TaskSelector;

  beforeEach(() => {
    selector = new TaskSelector(DEFAULT_TASK_POLICY);
    RandomUtils.seed("selector-test");
    simulationEvents.clearQueue();
  });

  describe("con energía", () => {
    const carrier = () => createAgent({ name: "carrier", energy: 50, capacity: 50 });

    it("debe priorizar el controlador en peligro sobre las extensiones", () => {
      // nivel 2: 10000 - 5000 de margen = 5000
      const controller = createController("ctrl", pos(10, 10), 2, 4999);
      const extension = createExtension("ext", pos(26, 26), 0);
      const world = new FakeWorld([new FakeRoom({ structures: [extension, controller] })]);

      expect(selector.chooseTask(world, carrier())).toEqual(upgradeTask(controller));
    });

    it("no debe considerar en peligro un controlador justo en el umbral", () => {
      const controller = createController("ctrl", pos(10, 10), 2, 5000);
      const extension = createExtension("ext", pos(26, 26), 0);
      const world = new FakeWorld([new FakeRoom({ structures: [controller, extension] })]);

      expect(selector.chooseTask(world, carrier())).toEqual(storeTask(extension));
    });

    it("debe recargar el spawn antes que las extensiones", () => {
      const spawn = createSpawn("spawn", pos(40, 40), { energy: 100, capacity: 300 });
      const extension = createExtension("ext", pos(26, 26), 0);
      const world = new FakeWorld([new FakeRoom({ structures: [extension, spawn] })]);

      expect(selector.chooseTask(world, carrier())).toEqual(storeTask(spawn));
    });

    it("debe elegir la extensión libre más cercana", () => {
      const full = createExtension("ext-full", pos(25, 26), 50);
      const far = createExtension("ext-far", pos(35, 35), 0);
      const near = createExtension("ext-near", pos(28, 25), 10);
      const spawn = createSpawn("spawn", pos(40, 40), { energy: 300, capacity: 300 });
      const world = new FakeWorld([
        new FakeRoom({ structures: [spawn, full, far, near] }),
      ]);

      expect(selector.chooseTask(world, carrier())).toEqual(storeTask(near));
    });

    it("debe recargar torres cuando spawn y extensiones están llenos", () => {
      const extension = createExtension("ext", pos(26, 26), 50);
      const tower = createTower("tower", pos(30, 30), { energy: 500 });
      const world = new FakeWorld([new FakeRoom({ structures: [extension, tower] })]);

      expect(selector.chooseTask(world, carrier())).toEqual(storeTask(tower));
    });

    it("debe reparar carreteras por debajo del umbral de su terreno", () => {
      const swamp = (x: number, y: number) => (x === 5 && y === 5 ? Terrain.SWAMP : Terrain.PLAIN);
      const healthyPlain = createRoad("road-plain", pos(24, 24), 2500);
      const damagedSwamp = createRoad("road-swamp", pos(5, 5), 12499);
      const world = new FakeWorld([
        new FakeRoom({ structures: [healthyPlain, damagedSwamp], terrain: swamp }),
      ]);

      expect(selector.chooseTask(world, carrier())).toEqual(repairTask(damagedSwamp));
    });

    it("debe ir a obras propias antes que a la mejora de respaldo", () => {
      const controller = createController("ctrl", pos(10, 10), 3, 50_000);
      const foreign = createSite("site-foreign", pos(25, 24), false);
      const site = createSite("site", pos(30, 30));
      const world = new FakeWorld([
        new FakeRoom({ structures: [controller], constructionSites: [foreign, site] }),
      ]);

      expect(selector.chooseTask(world, carrier())).toEqual(constructTask(site));
    });

    it("debe mejorar el controlador propio como último recurso", () => {
      const controller = createController("ctrl", pos(10, 10), 3, 50_000);
      const world = new FakeWorld([new FakeRoom({ structures: [controller] })]);

      expect(selector.chooseTask(world, carrier())).toEqual(upgradeTask(controller));
    });

    it("debe ignorar controladores ajenos", () => {
      const foreign = createController("ctrl", pos(10, 10), 2, 100, false);
      const world = new FakeWorld([new FakeRoom({ structures: [foreign] })]);

      expect(selector.chooseTask(world, carrier())).toBeUndefined();
    });
  });

  describe("sin energía", () => {
    const empty = () => createAgent({ name: "empty", energy: 0 });

    it("debe recolectar aunque haya un controlador en peligro", () => {
      const controller = createController("ctrl", pos(10, 10), 1, 10);
      const source = createSource("src", pos(5, 5));
      const world = new FakeWorld([
        new FakeRoom({ structures: [controller], sources: [source] }),
      ]);

      expect(selector.chooseTask(world, empty())).toEqual(harvestTask(source));
    });

    it("debe quedarse sin tarea si no hay fuentes activas", () => {
      const drained = createSource("src", pos(5, 5), 0);
      const world = new FakeWorld([new FakeRoom({ sources: [drained] })]);

      expect(selector.chooseTask(world, empty())).toBeUndefined();
    });

    it("debe sesgar la elección hacia el final de la lista de fuentes", () => {
      const sources = [0, 1, 2, 3].map((i) => createSource(`src-${i}`, pos(5 + i, 5)));
      const world = new FakeWorld([new FakeRoom({ sources })]);
      const agent = empty();

      const counts = new Map<string, number>();
      const draws = 4000;
      for (let i = 0; i < draws; i++) {
        const task = selector.chooseTask(world, agent);
        const id = task && "sourceId" in task ? task.sourceId : "none";
        counts.set(id, (counts.get(id) ?? 0) + 1);
      }

      // máximo de dos sorteos: P(i) = (2i + 1) / 16 → 1/16, 3/16, 5/16, 7/16
      const first = counts.get("src-0") ?? 0;
      const last = counts.get("src-3") ?? 0;
      expect(counts.get("none")).toBeUndefined();
      expect(last).toBeGreaterThan(first * 4);
      expect(last / draws).toBeGreaterThan(0.38);
      expect(first / draws).toBeLessThan(0.1);
    });
  });

  it("debe devolver undefined si la sala del agente no es visible", () => {
    const agent = createAgent({ name: "lost", energy: 50, at: pos(1, 1, "W9N9") });
    expect(selector.chooseTask(new FakeWorld(), agent)).toBeUndefined();
  });

  describe("assignTask", () => {
    it("debe insertar la tarea y emitir TASK_ASSIGNED", () => {
      const source = createSource("src", pos(5, 5));
      const world = new FakeWorld([new FakeRoom({ sources: [source] })]);
      const agent = createAgent({ name: "a" });
      const registry = new TaskRegistry();
      const listener = vi.fn();
      const unsubscribe = simulationEvents.onEvent(GameEventType.TASK_ASSIGNED, listener);

      const task = registry.withLock((locked) => {
        const entry = locked.entry("a");
        if (entry.state !== EntryState.VACANT) throw new Error("expected vacant");
        return selector.assignTask(entry, world, agent);
      });
      simulationEvents.flushEvents();
      unsubscribe();

      expect(task).toEqual(harvestTask(source));
      expect(registry.get("a")).toEqual(harvestTask(source));
      expect(listener).toHaveBeenCalledWith({ agentId: "a", task: harvestTask(source), tick: 1 });
    });

    it("debe registrar la asignación en la categoría de IA", () => {
      const source = createSource("src", pos(5, 5));
      const world = new FakeWorld([new FakeRoom({ sources: [source] })]);
      const agent = createAgent({ name: "a" });
      const registry = new TaskRegistry();
      logger.clear();

      registry.withLock((locked) => {
        const entry = locked.entry("a");
        if (entry.state !== EntryState.VACANT) throw new Error("expected vacant");
        selector.assignTask(entry, world, agent);
      });

      const entries = logger.queryLogs({ categories: [LogCategory.AI], agentId: "a" });
      expect(entries.map((entry) => entry.message)).toEqual(["[Agent:a] assigned harvest(src)"]);
    });

    it("debe emitir AGENT_IDLE y no tocar el registro sin candidatos", () => {
      const world = new FakeWorld();
      const agent = createAgent({ name: "a" });
      const registry = new TaskRegistry();
      const listener = vi.fn();
      const unsubscribe = simulationEvents.onEvent(GameEventType.AGENT_IDLE, listener);

      registry.withLock((locked) => {
        const entry = locked.entry("a");
        if (entry.state !== EntryState.VACANT) throw new Error("expected vacant");
        expect(selector.assignTask(entry, world, agent)).toBeUndefined();
      });
      simulationEvents.flushEvents();
      unsubscribe();

      expect(registry.size).toBe(0);
      expect(listener).toHaveBeenCalledWith({ agentId: "a", tick: 1 });
    });
  });
});
