import { ResourceType } from "@/shared/constants/StructureEnums";
import type { TaskKind } from "@/shared/constants/TaskEnums";
import type { ResolvedTask } from "../../../core/ReferentResolver";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { performInRange } from "./performInRange";

type ResolvedStore = Extract<ResolvedTask, { kind: TaskKind.STORE }>;

/**
 * Transfiere energía a spawn, extensión o torre. Un objetivo lleno o un
 * agente vacío hacen que el host rechace la transferencia y la tarea cae.
 */
export function handleStore(
  ctx: HandlerContext<ResolvedStore>,
): HandlerExecutionResult {
  return performInRange(ctx, () =>
    ctx.agent.transfer(ctx.resolved.target, ResourceType.ENERGY),
  );
}
