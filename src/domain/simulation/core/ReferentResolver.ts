import { injectable } from "inversify";
import { TaskKind } from "../../../shared/constants/TaskEnums";
import {
  ObjectType,
  StructureType,
} from "../../../shared/constants/StructureEnums";
import type {
  ConstructionSite,
  Controller,
  ObjectId,
  RepairableStructure,
  RoomObject,
  Source,
  StoreTarget,
} from "../../../shared/types/simulation/world";
import type {
  ConstructTask,
  HarvestTask,
  RepairTask,
  StoreTask,
  TaskHandle,
  UpgradeTask,
} from "../../../shared/types/simulation/tasks";
import type { IWorldPort } from "../ports";

/**
 * A task paired with this tick's live referent.
 */
export type ResolvedTask =
  | { readonly kind: TaskKind.UPGRADE; readonly task: UpgradeTask; readonly target: Controller }
  | { readonly kind: TaskKind.HARVEST; readonly task: HarvestTask; readonly target: Source }
  | { readonly kind: TaskKind.CONSTRUCT; readonly task: ConstructTask; readonly target: ConstructionSite }
  | { readonly kind: TaskKind.REPAIR; readonly task: RepairTask; readonly target: RepairableStructure }
  | { readonly kind: TaskKind.STORE; readonly task: StoreTask; readonly target: StoreTarget };

export function asController(object: RoomObject | undefined): Controller | undefined {
  if (object?.objectType !== ObjectType.STRUCTURE) return undefined;
  return object.structureType === StructureType.CONTROLLER ? object : undefined;
}

export function asSource(object: RoomObject | undefined): Source | undefined {
  return object?.objectType === ObjectType.SOURCE ? object : undefined;
}

export function asConstructionSite(
  object: RoomObject | undefined,
): ConstructionSite | undefined {
  return object?.objectType === ObjectType.CONSTRUCTION_SITE ? object : undefined;
}

export function asRepairable(
  object: RoomObject | undefined,
): RepairableStructure | undefined {
  if (object?.objectType !== ObjectType.STRUCTURE) return undefined;
  return object.structureType === StructureType.CONTROLLER ? undefined : object;
}

/**
 * Narrows to structures with an energy store. Anything else never resolves as
 * a store target.
 */
export function asStoreTarget(
  object: RoomObject | undefined,
): StoreTarget | undefined {
  if (object?.objectType !== ObjectType.STRUCTURE) return undefined;
  switch (object.structureType) {
    case StructureType.SPAWN:
    case StructureType.EXTENSION:
    case StructureType.TOWER:
      return object;
    default:
      return undefined;
  }
}

/**
 * Turns the stable ids kept in task handles into live objects for the
 * current tick. `undefined` means the referent is gone and the task must be
 * evicted.
 */
@injectable()
export class ReferentResolver {
  public resolve(world: IWorldPort, task: TaskHandle): ResolvedTask | undefined {
    switch (task.kind) {
      case TaskKind.UPGRADE: {
        const target = asController(this.lookup(world, task.controllerId));
        return target && { kind: TaskKind.UPGRADE, task, target };
      }
      case TaskKind.HARVEST: {
        const target = asSource(this.lookup(world, task.sourceId));
        return target && { kind: TaskKind.HARVEST, task, target };
      }
      case TaskKind.CONSTRUCT: {
        const target = asConstructionSite(this.lookup(world, task.siteId));
        return target && { kind: TaskKind.CONSTRUCT, task, target };
      }
      case TaskKind.REPAIR: {
        const target = asRepairable(this.lookup(world, task.structureId));
        return target && { kind: TaskKind.REPAIR, task, target };
      }
      case TaskKind.STORE: {
        const target = asStoreTarget(this.lookup(world, task.target.id));
        // la referencia también fija el tipo de estructura
        if (!target || target.structureType !== task.target.kind) {
          return undefined;
        }
        return { kind: TaskKind.STORE, task, target };
      }
      default:
        return undefined;
    }
  }

  private lookup(world: IWorldPort, id: ObjectId): RoomObject | undefined {
    return world.getObjectById(id);
  }
}
