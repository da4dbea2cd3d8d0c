import { errorMessage } from "../../errors.js";
import { createLogger } from "../../utils/logger.js";
import { stringParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";

const log = createLogger("SetVariable");

/** Writes `Value` into the blackboard variable named by `VarName`. */
export class SetVariableTask implements AtomicTask {
  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus {
    const varName = stringParam(params, "VarName");
    if (varName === undefined) {
      log.warn("Missing or invalid 'VarName' parameter");
      return "Failure";
    }
    const value = params.get("Value");
    if (!value) {
      log.warn("Missing 'Value' parameter");
      return "Failure";
    }
    if (!ctx.blackboard) {
      log.warn("No blackboard in context");
      return "Failure";
    }

    try {
      ctx.blackboard.setValue(varName, value);
    } catch (err) {
      log.warn(`Failed to set "${varName}": ${errorMessage(err)}`);
      return "Failure";
    }

    log.debug(`Entity ${ctx.entity} set "${varName}"`);
    return "Success";
  }

  abort(): void {}
}
