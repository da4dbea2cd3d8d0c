import type { LocalBlackboard } from "../blackboard/local-blackboard.js";
import type { TaskWorldFacade } from "../runtime/world.js";
import type { EntityId, TaskValue } from "../values/task-value.js";

/** Result of one `execute` call. */
export type TaskStatus = "Success" | "Failure" | "Running";

/** Parameters resolved for the current call: literals as authored, variables read live. */
export type ParameterMap = ReadonlyMap<string, TaskValue>;

export type AtomicTaskContext = {
  entity: EntityId;
  blackboard?: LocalBlackboard;
  /** Seconds elapsed since the previous tick. */
  deltaTime: number;
  /** Seconds this task has spent Running on its current node. */
  stateTimer: number;
  world?: TaskWorldFacade;
};

/**
 * A leaf behaviour. An instance belongs to exactly one runner for as long
 * as it is Running and is re-invoked on every tick until it finishes.
 * `abort()` is called at most once, and may arrive before any `execute`.
 */
export interface AtomicTask {
  execute(params: ParameterMap, ctx: AtomicTaskContext): TaskStatus;
  abort(): void;
}

export type AtomicTaskFactory = () => AtomicTask;
