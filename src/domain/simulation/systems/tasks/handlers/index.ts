/**
 * @fileoverview Índice de Handlers
 *
 * @module domain/simulation/systems/tasks/handlers
 */

import { TaskKind } from "@/shared/constants/TaskEnums";
import { ErrorKind } from "@/shared/constants/StatusEnums";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { evictResult } from "../types";
import { handleUpgrade } from "./UpgradeHandler";
import { handleHarvest } from "./HarvestHandler";
import { handleBuild } from "./BuildHandler";
import { handleRepair } from "./RepairHandler";
import { handleStore } from "./StoreHandler";

export { handleUpgrade, handleHarvest, handleBuild, handleRepair, handleStore };
export { moveTowardTarget, isInActionRange, actionRangeFor } from "./MoveHandler";
export { performInRange } from "./performInRange";

/**
 * Envía la tarea resuelta a su handler
 */
export function dispatchHandler(ctx: HandlerContext): HandlerExecutionResult {
  const { resolved } = ctx;
  switch (resolved.kind) {
    case TaskKind.UPGRADE:
      return handleUpgrade({ ...ctx, resolved });
    case TaskKind.HARVEST:
      return handleHarvest({ ...ctx, resolved });
    case TaskKind.CONSTRUCT:
      return handleBuild({ ...ctx, resolved });
    case TaskKind.REPAIR:
      return handleRepair({ ...ctx, resolved });
    case TaskKind.STORE:
      return handleStore({ ...ctx, resolved });
    default:
      return evictResult(ErrorKind.STALE_TASK, "Unknown task variant");
  }
}
