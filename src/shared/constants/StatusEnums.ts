/**
 * Status enumerations shared by the host ports and the task handlers.
 *
 * @module shared/constants/StatusEnums
 */

/**
 * Result code returned by every directive a host handle accepts
 * (move, harvest, build, transfer, repair, upgrade, attack, spawn).
 */
export enum ActionResult {
  OK = "ok",
  NOT_OWNER = "not_owner",
  NO_PATH = "no_path",
  NAME_EXISTS = "name_exists",
  BUSY = "busy",
  NOT_FOUND = "not_found",
  NOT_ENOUGH_RESOURCES = "not_enough_resources",
  INVALID_TARGET = "invalid_target",
  FULL = "full",
  NOT_IN_RANGE = "not_in_range",
  INVALID_ARGS = "invalid_args",
  TIRED = "tired",
  NO_BODYPART = "no_bodypart",
  RCL_NOT_ENOUGH = "rcl_not_enough",
}

/**
 * Failure taxonomy of the engine. None of these propagate past the
 * agent, tower or spawn being processed.
 */
export enum ErrorKind {
  /** Stable handle no longer resolves; the task is evicted. */
  REFERENT_GONE = "referent_gone",
  /** Too far for the terminal action; the agent moves instead. */
  OUT_OF_RANGE = "out_of_range",
  /** Terminal action refused for any other reason; the task is evicted. */
  ACTION_REJECTED = "action_rejected",
  /** Spawn directive refused; retried on the next tick. */
  CREATION_REJECTED = "creation_rejected",
  /** Nothing worth doing; the agent stays idle. */
  EMPTY_CANDIDATE_SET = "empty_candidate_set",
  /** Task kind or guard no longer matches the agent's load. */
  STALE_TASK = "stale_task",
}

/**
 * Maps a terminal action result onto the failure taxonomy.
 * Returns `null` when the action succeeded.
 */
export function classifyActionResult(
  result: ActionResult,
): ErrorKind.OUT_OF_RANGE | ErrorKind.ACTION_REJECTED | null {
  switch (result) {
    case ActionResult.OK:
      return null;
    case ActionResult.NOT_IN_RANGE:
      return ErrorKind.OUT_OF_RANGE;
    default:
      return ErrorKind.ACTION_REJECTED;
  }
}
