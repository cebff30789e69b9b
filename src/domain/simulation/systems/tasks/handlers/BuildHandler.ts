import type { TaskKind } from "@/shared/constants/TaskEnums";
import type { ResolvedTask } from "../../../core/ReferentResolver";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { performInRange } from "./performInRange";

type ResolvedConstruct = Extract<ResolvedTask, { kind: TaskKind.CONSTRUCT }>;

/**
 * Trabaja en la obra. Cuando la obra se completa desaparece y la tarea cae
 * por referente perdido en el siguiente tick.
 */
export function handleBuild(
  ctx: HandlerContext<ResolvedConstruct>,
): HandlerExecutionResult {
  return performInRange(ctx, () => ctx.agent.build(ctx.resolved.target));
}
