import type { PathfindingManager } from "../../pathfinding/manager.js";
import type { AtomicTaskRegistry } from "../registry.js";
import { CompareTask } from "./compare.js";
import { LogMessageTask } from "./log-message.js";
import { MoveToLocationTask, type MovementSettings } from "./move-to-location.js";
import { RequestPathfindingTask } from "./request-pathfinding.js";
import { SetVariableTask } from "./set-variable.js";
import { WaitTask } from "./wait.js";

export type BuiltinTaskDeps = {
  pathfinding: PathfindingManager;
  movement: MovementSettings;
  pathfindingDelaySeconds?: number;
};

export const BUILTIN_TASK_IDS = [
  "Compare",
  "LogMessage",
  "MoveToLocation",
  "RequestPathfinding",
  "SetVariable",
  "Wait",
] as const;

/** Register every built-in task under its short id. */
export function registerBuiltinTasks(registry: AtomicTaskRegistry, deps: BuiltinTaskDeps): void {
  registry.register("Compare", () => new CompareTask());
  registry.register("LogMessage", () => new LogMessageTask());
  registry.register("MoveToLocation", () => new MoveToLocationTask(deps.movement));
  registry.register(
    "RequestPathfinding",
    () => new RequestPathfindingTask(deps.pathfinding, deps.pathfindingDelaySeconds),
  );
  registry.register("SetVariable", () => new SetVariableTask());
  registry.register("Wait", () => new WaitTask());
}

export { CompareTask, compareValues, COMPARE_OPERATORS, type CompareOperator } from "./compare.js";
export { LogMessageTask } from "./log-message.js";
export { MoveToLocationTask, POSITION_VARIABLE, type MovementSettings } from "./move-to-location.js";
export { PATH_VARIABLE, RequestPathfindingTask } from "./request-pathfinding.js";
export { SetVariableTask } from "./set-variable.js";
export { WaitTask } from "./wait.js";
