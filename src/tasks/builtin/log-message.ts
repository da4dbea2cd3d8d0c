import { createLogger } from "../../utils/logger.js";
import { stringParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";

const log = createLogger("LogMessage");

export class LogMessageTask implements AtomicTask {
  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus {
    const message = stringParam(params, "message") ?? "(no message)";
    log.info(message, { entity: ctx.entity });
    return "Success";
  }

  abort(): void {}
}
