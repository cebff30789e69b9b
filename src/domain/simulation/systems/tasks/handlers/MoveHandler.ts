/**
 * @fileoverview Handler de Movimiento
 *
 * Paso de movimiento compartido por todas las tareas. El pathfinding es del
 * host: aquí solo se pide `moveTo` con la pista de reutilización de ruta que
 * corresponde al tipo de tarea. Un movimiento fallido nunca desaloja la tarea.
 *
 * @module domain/simulation/systems/tasks/handlers/MoveHandler
 */

import { logger, LogCategory, LogLevel } from "@/infrastructure/utils/logger";
import { ActionResult } from "@/shared/constants/StatusEnums";
import { describeTask } from "@/shared/types/simulation/tasks";
import { isWithinRange } from "@/shared/utils/mathUtils";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { movingResult } from "../types";

/**
 * Rango máximo de la acción terminal de la tarea
 */
export function actionRangeFor(ctx: HandlerContext): number {
  return ctx.policy.actionRange[ctx.resolved.kind];
}

/**
 * Verifica si el agente está a rango de la acción terminal
 */
export function isInActionRange(ctx: HandlerContext): boolean {
  return isWithinRange(ctx.agent.pos, ctx.resolved.target.pos, actionRangeFor(ctx));
}

/**
 * Da un paso hacia el objetivo de la tarea
 */
export function moveTowardTarget(ctx: HandlerContext): HandlerExecutionResult {
  const { agent, resolved, policy } = ctx;
  const code = agent.moveTo(resolved.target.pos, {
    reusePath: policy.pathReuse[resolved.kind],
  });

  if (code !== ActionResult.OK) {
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.TASKS,
      agent.name,
      `moveTo failed for ${describeTask(resolved.task)}: ${code}`,
    );
  }

  return movingResult(code);
}
