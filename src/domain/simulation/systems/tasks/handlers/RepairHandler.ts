import type { TaskKind } from "@/shared/constants/TaskEnums";
import type { ResolvedTask } from "../../../core/ReferentResolver";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { performInRange } from "./performInRange";

type ResolvedRepair = Extract<ResolvedTask, { kind: TaskKind.REPAIR }>;

/**
 * Una sola reparación por tarea: tras el primer éxito se desaloja
 */
export function handleRepair(
  ctx: HandlerContext<ResolvedRepair>,
): HandlerExecutionResult {
  return performInRange(ctx, () => ctx.agent.repair(ctx.resolved.target), {
    completesOnSuccess: true,
  });
}
