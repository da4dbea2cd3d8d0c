import { errorMessage } from "../../errors.js";
import { createLogger } from "../../utils/logger.js";
import { vectorValue } from "../../values/task-value.js";
import { add, distance, formatVector, scale, subtract, ZERO_VECTOR } from "../../values/vector.js";
import { numberParam, vectorParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";

const log = createLogger("MoveToLocation");

export const POSITION_VARIABLE = "Position";

export type MovementSettings = {
  defaultSpeed: number;
  acceptanceRadius: number;
};

/**
 * Moves the entity toward `Target`.
 *
 * With position and movement components in the world facade it steers by
 * velocity and leaves integration to the host. Otherwise it steps the
 * `Position` blackboard variable by `Speed * deltaTime` each tick.
 */
export class MoveToLocationTask implements AtomicTask {
  constructor(private readonly settings: MovementSettings) {}

  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus {
    const target = vectorParam(params, "Target");
    if (!target) {
      log.warn("Missing or invalid 'Target' parameter");
      return "Failure";
    }

    const speedParam = numberParam(params, "Speed");
    const speed = speedParam !== undefined && speedParam > 0 ? speedParam : this.settings.defaultSpeed;
    const radiusParam = numberParam(params, "AcceptanceRadius");
    const radius = radiusParam !== undefined && radiusParam >= 0 ? radiusParam : this.settings.acceptanceRadius;

    const position = ctx.world?.position;
    const movement = ctx.world?.movement;
    if (position && movement) {
      const delta = subtract(target, position.position);
      const dist = distance(position.position, target);
      if (dist <= radius) {
        movement.velocity = ZERO_VECTOR;
        log.debug(`Entity ${ctx.entity} reached ${formatVector(target)}`);
        return "Success";
      }
      movement.velocity = scale(delta, speed / dist);
      return "Running";
    }

    const bb = ctx.blackboard;
    if (!bb || bb.getDeclaredType(POSITION_VARIABLE) !== "Vector") {
      log.warn(`No world position and no Vector '${POSITION_VARIABLE}' variable`);
      return "Failure";
    }

    const current = bb.getValue(POSITION_VARIABLE);
    if (current.type !== "Vector") return "Failure";
    const pos = current.value;

    const dist = distance(pos, target);
    const step = speed * ctx.deltaTime;

    try {
      if (dist <= radius || dist <= step) {
        bb.setValue(POSITION_VARIABLE, vectorValue(target));
        log.debug(`Entity ${ctx.entity} reached ${formatVector(target)}`);
        return "Success";
      }
      bb.setValue(POSITION_VARIABLE, vectorValue(add(pos, scale(subtract(target, pos), step / dist))));
    } catch (err) {
      log.warn(`Failed to write '${POSITION_VARIABLE}': ${errorMessage(err)}`);
      return "Failure";
    }
    return "Running";
  }

  abort(): void {
    log.debug("Aborted");
  }
}
