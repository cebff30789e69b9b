import { constructTask } from "@/shared/types/simulation/tasks";
import type { TaskHandle } from "@/shared/types/simulation/tasks";
import { findClosestByRange } from "@/shared/utils/mathUtils";
import type { DetectorContext } from "../types";

/**
 * Detecta obras propias pendientes
 */
export function detectConstruction(ctx: DetectorContext): TaskHandle | undefined {
  const sites = ctx.room.constructionSites.filter((site) => site.my);
  const site = findClosestByRange(ctx.agent.pos, sites);
  return site && constructTask(site);
}
