import { errorMessage } from "../../errors.js";
import { INVALID_REQUEST_ID, type PathfindingManager, type RequestId } from "../../pathfinding/manager.js";
import { createLogger } from "../../utils/logger.js";
import { stringValue } from "../../values/task-value.js";
import { numberParam, vectorParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";
import { POSITION_VARIABLE } from "./move-to-location.js";

const log = createLogger("RequestPathfinding");

export const PATH_VARIABLE = "Path";

/**
 * Submits a path request on its first call and polls it afterwards. The
 * finished waypoint string lands in the `Path` blackboard variable.
 */
export class RequestPathfindingTask implements AtomicTask {
  private requestId: RequestId = INVALID_REQUEST_ID;

  constructor(
    private readonly pathfinding: PathfindingManager,
    private readonly defaultDelaySeconds = 0,
  ) {}

  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus {
    const bb = ctx.blackboard;
    if (!bb || bb.getDeclaredType(PATH_VARIABLE) !== "String") {
      log.warn(`No String '${PATH_VARIABLE}' variable on the blackboard`);
      return "Failure";
    }

    if (this.requestId === INVALID_REQUEST_ID) {
      const target = vectorParam(params, "Target");
      if (!target) {
        log.warn("Missing or invalid 'Target' parameter");
        return "Failure";
      }

      let start = vectorParam(params, "Start");
      if (!start) {
        const pos = bb.hasVariable(POSITION_VARIABLE) ? bb.getValue(POSITION_VARIABLE) : undefined;
        if (pos?.type !== "Vector") {
          log.warn(`No 'Start' parameter and no Vector '${POSITION_VARIABLE}' variable`);
          return "Failure";
        }
        start = pos.value;
      }

      const delay = Math.max(0, numberParam(params, "AsyncDelay") ?? this.defaultDelaySeconds);
      this.requestId = this.pathfinding.request(start, target, delay);
      log.debug(`Entity ${ctx.entity} submitted request ${this.requestId}`);
      return "Running";
    }

    if (!this.pathfinding.isComplete(this.requestId)) {
      return "Running";
    }

    const path = this.pathfinding.getPathString(this.requestId);
    this.release();

    try {
      bb.setValue(PATH_VARIABLE, stringValue(path));
    } catch (err) {
      log.warn(`Failed to write '${PATH_VARIABLE}': ${errorMessage(err)}`);
      return "Failure";
    }
    log.debug(`Entity ${ctx.entity} path ready: ${path}`);
    return "Success";
  }

  abort(): void {
    if (this.requestId !== INVALID_REQUEST_ID) {
      log.debug(`Cancelling request ${this.requestId}`);
    }
    this.release();
  }

  private release(): void {
    if (this.requestId === INVALID_REQUEST_ID) return;
    this.pathfinding.cancel(this.requestId);
    this.requestId = INVALID_REQUEST_ID;
  }
}
