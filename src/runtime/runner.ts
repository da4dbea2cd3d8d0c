import { LocalBlackboard, type RestoreReport } from "../blackboard/local-blackboard.js";
import type { TaskGraphTemplate } from "../graph/template.js";
import { NODE_NONE, type NodeId } from "../graph/types.js";
import type { AtomicTask } from "../tasks/task.js";
import { createLogger } from "../utils/logger.js";
import type { EntityId } from "../values/task-value.js";
import type { TaskWorldFacade } from "./world.js";

const log = createLogger("TaskRunner");

/** Outcome of the most recently completed or aborted node. */
export type RunnerStatus = "Success" | "Failure" | "Aborted";

export const RUNNER_STATUSES: readonly RunnerStatus[] = ["Success", "Failure", "Aborted"];

/** The in-flight task together with the node that created it. */
export type ActiveTask = {
  readonly nodeId: NodeId;
  readonly task: AtomicTask;
};

/** Persisted form of a runner; the active task instance is not part of it. */
export type RunnerSnapshot = {
  entity: EntityId;
  templateName: string;
  nodeId: NodeId;
  stateTimer: number;
  lastStatus: RunnerStatus | null;
  blackboard: Buffer;
};

/**
 * Per-entity runtime state for one bound template: the node cursor, the
 * elapsed time on the current node, the last completed status, the
 * blackboard and at most one active task.
 */
export class TaskRunner {
  readonly entity: EntityId;
  readonly blackboard = new LocalBlackboard();
  world?: TaskWorldFacade;

  currentNodeId: NodeId = NODE_NONE;
  stateTimer = 0;
  lastStatus: RunnerStatus | null = null;
  active: ActiveTask | null = null;

  private boundTemplate: TaskGraphTemplate;

  constructor(entity: EntityId, template: TaskGraphTemplate, world?: TaskWorldFacade) {
    this.entity = entity;
    this.world = world;
    this.boundTemplate = template;
    this.bind(template);
  }

  get template(): TaskGraphTemplate {
    return this.boundTemplate;
  }

  /** True once the cursor is NODE_NONE and nothing is left to abort. */
  get finished(): boolean {
    return this.currentNodeId === NODE_NONE && this.active === null;
  }

  /**
   * Attach to `template` (or re-attach to the current one), starting over
   * from its root with fresh blackboard values.
   */
  bind(template: TaskGraphTemplate = this.boundTemplate): void {
    this.abortActive();
    this.boundTemplate = template;
    this.blackboard.initialize(template);
    this.currentNodeId = template.rootNodeId;
    this.stateTimer = 0;
    this.lastStatus = null;
  }

  /** Request a stop. The active task is aborted on the next executor pass. */
  interrupt(): void {
    this.currentNodeId = NODE_NONE;
  }

  /** Abort and release the active task, if any. Returns whether one was aborted. */
  abortActive(): boolean {
    const active = this.active;
    if (!active) return false;
    this.active = null;
    this.stateTimer = 0;
    active.task.abort();
    return true;
  }

  snapshot(): RunnerSnapshot {
    return {
      entity: this.entity,
      templateName: this.boundTemplate.name,
      nodeId: this.currentNodeId,
      stateTimer: this.stateTimer,
      lastStatus: this.lastStatus,
      blackboard: this.blackboard.serialize(),
    };
  }

  /**
   * Adopt persisted state. Any active task is aborted; the task on the
   * restored node is created afresh on the next tick and resumes with the
   * restored timer.
   */
  restore(snapshot: RunnerSnapshot): RestoreReport {
    if (snapshot.templateName !== this.boundTemplate.name) {
      log.warn(`Snapshot was taken from template "${snapshot.templateName}"`, {
        entity: this.entity,
        bound: this.boundTemplate.name,
      });
    }
    this.abortActive();
    this.blackboard.reset();
    this.currentNodeId = snapshot.nodeId;
    this.stateTimer = snapshot.stateTimer;
    this.lastStatus = snapshot.lastStatus;
    return this.blackboard.deserialize(snapshot.blackboard);
  }
}
