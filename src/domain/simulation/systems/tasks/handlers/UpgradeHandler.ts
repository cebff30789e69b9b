import type { TaskKind } from "@/shared/constants/TaskEnums";
import type { ResolvedTask } from "../../../core/ReferentResolver";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { performInRange } from "./performInRange";

type ResolvedUpgrade = Extract<ResolvedTask, { kind: TaskKind.UPGRADE }>;

/**
 * Mejora el controlador mientras quede energía
 */
export function handleUpgrade(
  ctx: HandlerContext<ResolvedUpgrade>,
): HandlerExecutionResult {
  return performInRange(ctx, () =>
    ctx.agent.upgradeController(ctx.resolved.target),
  );
}
