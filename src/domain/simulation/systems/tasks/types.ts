/**
 * @fileoverview Tipos del sistema de tareas
 *
 * - Detectores: observan la sala y proponen como mucho una tarea (el primero
 *   que encuentra algo gana).
 * - Handlers: ejecutan la acción terminal o un paso de movimiento para una
 *   tarea ya resuelta.
 *
 * @module domain/simulation/systems/tasks/types
 */

import { ActionResult, ErrorKind } from "@/shared/constants/StatusEnums";
import { TaskOutcome } from "@/shared/constants/TaskEnums";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import type {
  AgentHandle,
  RoomSnapshot,
} from "@/shared/types/simulation/world";
import type { TaskPolicy } from "../../core/SimulationConstants";
import type { ResolvedTask } from "../../core/ReferentResolver";

/**
 * Contexto de solo lectura que reciben los detectores.
 */
export interface DetectorContext {
  readonly agent: AgentHandle;
  readonly room: RoomSnapshot;
  readonly policy: TaskPolicy;
  /** Energía que transporta el agente */
  readonly carriedEnergy: number;
}

/**
 * Un detector devuelve la tarea que propone, o `undefined` si no aplica.
 */
export type Detector = (ctx: DetectorContext) => TaskHandle | undefined;

/**
 * Contexto que reciben los handlers: la tarea ya resuelta contra el mundo
 * de este tick.
 */
export interface HandlerContext<R extends ResolvedTask = ResolvedTask> {
  readonly agent: AgentHandle;
  readonly resolved: R;
  readonly policy: TaskPolicy;
  readonly tick: number;
}

/**
 * Resultado de un handler
 */
export interface HandlerExecutionResult {
  outcome: TaskOutcome;
  /** Si la tarea debe salir del registro */
  evict: boolean;
  /** Clasificación del fallo, si lo hubo */
  reason?: ErrorKind;
  /** Código devuelto por el host para la última directiva */
  code?: ActionResult;
  message?: string;
}

/**
 * La acción terminal funcionó y la tarea sigue activa
 */
export function workedResult(code: ActionResult = ActionResult.OK): HandlerExecutionResult {
  return { outcome: TaskOutcome.WORKED, evict: false, code };
}

/**
 * La acción terminal funcionó y la tarea termina (p. ej. reparación)
 */
export function completedResult(code: ActionResult = ActionResult.OK): HandlerExecutionResult {
  return { outcome: TaskOutcome.COMPLETED, evict: true, code };
}

/**
 * El agente se acercó (o lo intentó) al objetivo
 */
export function movingResult(code: ActionResult): HandlerExecutionResult {
  return { outcome: TaskOutcome.MOVING, evict: false, code };
}

/**
 * La tarea sale del registro por un fallo
 */
export function evictResult(
  reason: ErrorKind,
  message: string,
  code?: ActionResult,
): HandlerExecutionResult {
  return { outcome: TaskOutcome.EVICTED, evict: true, reason, code, message };
}
