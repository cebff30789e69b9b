import type { TaskKind } from "@/shared/constants/TaskEnums";
import type { ResolvedTask } from "../../../core/ReferentResolver";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { performInRange } from "./performInRange";

type ResolvedHarvest = Extract<ResolvedTask, { kind: TaskKind.HARVEST }>;

/**
 * Recolecta de la fuente; la tarea sigue hasta que el agente se llena
 */
export function handleHarvest(
  ctx: HandlerContext<ResolvedHarvest>,
): HandlerExecutionResult {
  return performInRange(ctx, () => ctx.agent.harvest(ctx.resolved.target));
}
