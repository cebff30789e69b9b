import { classifyActionResult, ErrorKind } from "@/shared/constants/StatusEnums";
import type { ActionResult } from "@/shared/constants/StatusEnums";
import { describeTask } from "@/shared/types/simulation/tasks";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { completedResult, evictResult, workedResult } from "../types";
import { isInActionRange, moveTowardTarget } from "./MoveHandler";

export interface PerformOptions {
  /** La tarea termina tras un éxito (reparación de un solo golpe) */
  completesOnSuccess?: boolean;
}

/**
 * Núcleo común de los handlers: a rango ejecuta la acción, fuera de rango
 * se mueve. Un NOT_IN_RANGE del host cae también al paso de movimiento;
 * cualquier otro fallo desaloja la tarea.
 */
export function performInRange(
  ctx: HandlerContext,
  action: () => ActionResult,
  options: PerformOptions = {},
): HandlerExecutionResult {
  if (!isInActionRange(ctx)) {
    return moveTowardTarget(ctx);
  }

  const code = action();
  switch (classifyActionResult(code)) {
    case null:
      return options.completesOnSuccess ? completedResult(code) : workedResult(code);
    case ErrorKind.OUT_OF_RANGE:
      return moveTowardTarget(ctx);
    case ErrorKind.ACTION_REJECTED:
      return evictResult(
        ErrorKind.ACTION_REJECTED,
        `${describeTask(ctx.resolved.task)} rejected: ${code}`,
        code,
      );
  }
}
