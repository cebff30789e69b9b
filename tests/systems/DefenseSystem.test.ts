import { describe, it, expect, beforeEach } from "vitest";
import { DefenseSystem } from "../../src/domain/simulation/systems/defense/DefenseSystem";
import { DEFAULT_TASK_POLICY } from "../../src/domain/simulation/core/SimulationConstants";
import { simulationEvents } from "../../src/domain/simulation/core/events";
import { ActionResult } from "../../src/shared/constants/StatusEnums";
import { FakeRoom, FakeWorld, createHostile, createTower, pos } from "../setup";

describe("DefenseSystem", () => {
  let system: DefenseSystem;

  beforeEach(() => {
    system = new DefenseSystem(DEFAULT_TASK_POLICY);
    simulationEvents.clearQueue();
  });

  it("debe atacar al hostil más cercano de cada torre", () => {
    const west = createTower("west", pos(5, 25));
    const east = createTower("east", pos(45, 25));
    const near = createHostile("near-west", pos(8, 25));
    const far = createHostile("near-east", pos(40, 25));
    const world = new FakeWorld([
      new FakeRoom({ structures: [west, east], hostiles: [far, near] }),
    ]);

    const stats = system.update(world);

    expect(stats).toEqual({ towers: 2, attacks: 2, failures: 0 });
    expect(west.attack).toHaveBeenCalledWith(near);
    expect(east.attack).toHaveBeenCalledWith(far);
  });

  it("debe ignorar hostiles fuera del alcance configurado", () => {
    const tower = createTower("tower", pos(0, 0));
    const world = new FakeWorld([
      new FakeRoom({ structures: [tower], hostiles: [createHostile("h", pos(49, 49))] }),
    ]);
    const shortRange = new DefenseSystem({ ...DEFAULT_TASK_POLICY, towerRange: 20 });

    expect(shortRange.update(world).attacks).toBe(0);
    expect(tower.attack).not.toHaveBeenCalled();
  });

  it("no debe usar torres ajenas", () => {
    const foreign = createTower("foreign", pos(10, 10), { my: false });
    const world = new FakeWorld([
      new FakeRoom({ structures: [foreign], hostiles: [createHostile("h", pos(12, 12))] }),
    ]);

    expect(system.update(world).towers).toBe(0);
    expect(foreign.attack).not.toHaveBeenCalled();
  });

  it("debe contar los fallos sin detener al resto de torres", () => {
    const broken = createTower("broken", pos(10, 10));
    broken.attack.mockImplementation(() => {
      throw new Error("tower offline");
    });
    const empty = createTower("empty", pos(12, 10), { energy: 0 });
    empty.attack.mockReturnValue(ActionResult.NOT_ENOUGH_RESOURCES);
    const working = createTower("working", pos(14, 10));
    const world = new FakeWorld([
      new FakeRoom({
        structures: [broken, empty, working],
        hostiles: [createHostile("h", pos(20, 20))],
      }),
    ]);

    expect(system.update(world)).toEqual({ towers: 3, attacks: 1, failures: 2 });
    expect(working.attack).toHaveBeenCalledTimes(1);
  });
});
