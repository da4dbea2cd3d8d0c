import { createLogger } from "../../utils/logger.js";
import { numberParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";

const log = createLogger("Wait");

/** Running until the node's state timer reaches `Duration` seconds. */
export class WaitTask implements AtomicTask {
  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus {
    const duration = numberParam(params, "Duration");
    if (duration === undefined) {
      log.warn("Missing or invalid 'Duration' parameter");
      return "Failure";
    }
    if (!(duration > 0)) {
      log.warn(`Duration must be positive (got ${duration})`);
      return "Failure";
    }

    if (ctx.stateTimer >= duration) {
      log.debug(`Entity ${ctx.entity} wait complete`);
      return "Success";
    }
    return "Running";
  }

  abort(): void {
    log.debug("Aborted");
  }
}
