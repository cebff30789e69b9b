/**
 * Task handles stored in the task registry.
 *
 * A handle only carries stable ids. It is serializable and safe to keep across
 * ticks; the live referent is looked up again every tick.
 *
 * @module shared/types/simulation/tasks
 */

import { TaskKind } from "../../constants/TaskEnums";
import type { StoreTargetKind } from "../../constants/StructureEnums";
import type {
  ConstructionSite,
  Controller,
  ObjectId,
  RepairableStructure,
  Source,
  StoreTarget,
} from "./world";

/**
 * One case per storable structure kind.
 */
export type StoreTargetRef = {
  [K in StoreTargetKind]: { readonly kind: K; readonly id: ObjectId };
}[StoreTargetKind];

export interface UpgradeTask {
  readonly kind: TaskKind.UPGRADE;
  readonly controllerId: ObjectId;
}

export interface HarvestTask {
  readonly kind: TaskKind.HARVEST;
  readonly sourceId: ObjectId;
}

export interface ConstructTask {
  readonly kind: TaskKind.CONSTRUCT;
  readonly siteId: ObjectId;
}

export interface RepairTask {
  readonly kind: TaskKind.REPAIR;
  readonly structureId: ObjectId;
}

export interface StoreTask {
  readonly kind: TaskKind.STORE;
  readonly target: StoreTargetRef;
}

export type TaskHandle =
  | UpgradeTask
  | HarvestTask
  | ConstructTask
  | RepairTask
  | StoreTask;

export function upgradeTask(controller: Controller): UpgradeTask {
  return { kind: TaskKind.UPGRADE, controllerId: controller.id };
}

export function harvestTask(source: Source): HarvestTask {
  return { kind: TaskKind.HARVEST, sourceId: source.id };
}

export function constructTask(site: ConstructionSite): ConstructTask {
  return { kind: TaskKind.CONSTRUCT, siteId: site.id };
}

export function repairTask(structure: RepairableStructure): RepairTask {
  return { kind: TaskKind.REPAIR, structureId: structure.id };
}

export function storeTargetRef(target: StoreTarget): StoreTargetRef {
  return { kind: target.structureType, id: target.id };
}

export function storeTask(target: StoreTarget): StoreTask {
  return { kind: TaskKind.STORE, target: storeTargetRef(target) };
}

/**
 * Short human-readable label used in logs, e.g. `store:extension(ext-1)`.
 */
export function describeTask(task: TaskHandle): string {
  switch (task.kind) {
    case TaskKind.UPGRADE:
      return `upgrade(${task.controllerId})`;
    case TaskKind.HARVEST:
      return `harvest(${task.sourceId})`;
    case TaskKind.CONSTRUCT:
      return `construct(${task.siteId})`;
    case TaskKind.REPAIR:
      return `repair(${task.structureId})`;
    case TaskKind.STORE:
      return `store:${task.target.kind}(${task.target.id})`;
    default:
      return `unknown(${JSON.stringify(task)})`;
  }
}
