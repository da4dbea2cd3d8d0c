import type { NodeId } from "../graph/types.js";
import type { TaskStatus } from "../tasks/task.js";
import type { EntityId, TaskValue } from "../values/task-value.js";

/** What a single executor pass did for one runner. */
export type StepOutcome = TaskStatus | "Aborted" | "Idle";

export type StepResult = {
  entity: EntityId;
  /** Node the pass acted on; NODE_NONE for an idle runner. */
  nodeId: NodeId;
  outcome: StepOutcome;
  /** Cursor after the pass. */
  nextNodeId: NodeId;
};

/** Published after every pass that did something. */
export type ExecutorStep = {
  entity: EntityId;
  nodeId: NodeId;
  status: Exclude<StepOutcome, "Idle">;
  blackboard: Readonly<Record<string, TaskValue>>;
};

export type ExecutorObserver = (step: ExecutorStep) => void;

export type ExecutorOptions = {
  observer?: ExecutorObserver;
};
