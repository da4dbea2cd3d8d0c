import { BlackboardError, errorMessage } from "../errors.js";
import { NODE_NONE, type NodeId, type TaskNodeDefinition } from "../graph/types.js";
import type { TaskRunner } from "../runtime/runner.js";
import type { AtomicTaskRegistry } from "../tasks/registry.js";
import type { ParameterMap } from "../tasks/task.js";
import { createLogger } from "../utils/logger.js";
import type { TaskValue } from "../values/task-value.js";
import type { ExecutorObserver, ExecutorOptions, ExecutorStep, StepResult } from "./types.js";

const log = createLogger("TaskExecutor");

/** Thrown inside a pass when a node cannot be dispatched; resolved as Failure. */
class DispatchError extends Error {}

/** Resolve a node's bindings against the runner's blackboard. */
export function resolveParameters(node: TaskNodeDefinition, runner: TaskRunner): ParameterMap {
  const params = new Map<string, TaskValue>();
  for (const [name, binding] of Object.entries(node.parameters)) {
    if (binding.kind === "literal") {
      params.set(name, binding.value);
      continue;
    }
    if (!runner.blackboard.hasVariable(binding.variableName)) {
      throw new DispatchError(`Parameter "${name}" is bound to unknown variable "${binding.variableName}"`);
    }
    params.set(name, runner.blackboard.getValue(binding.variableName));
  }
  return params;
}

/**
 * Advances task runners one node step at a time.
 *
 * The graph is walked as a flat cursor over AtomicTask nodes using each
 * node's nextOnSuccess / nextOnFailure. A Running task keeps its instance
 * across ticks; moving the cursor away from it (including to NODE_NONE)
 * aborts it on the next pass.
 */
export class TaskExecutor {
  private registry: AtomicTaskRegistry;
  private observer?: ExecutorObserver;

  constructor(registry: AtomicTaskRegistry, opts?: ExecutorOptions) {
    this.registry = registry;
    this.observer = opts?.observer;
  }

  setObserver(observer: ExecutorObserver | undefined): void {
    this.observer = observer;
  }

  /** Advance every runner once, in order. */
  tick(runners: Iterable<TaskRunner>, deltaTime: number): StepResult[] {
    const results: StepResult[] = [];
    for (const runner of runners) {
      results.push(this.executeNode(runner, deltaTime));
    }
    return results;
  }

  /** One step of the runner's state machine. */
  executeNode(runner: TaskRunner, deltaTime: number): StepResult {
    const nodeId = runner.currentNodeId;

    if (nodeId === NODE_NONE) {
      const active = runner.active;
      if (!active) {
        return { entity: runner.entity, nodeId, outcome: "Idle", nextNodeId: NODE_NONE };
      }
      runner.abortActive();
      runner.lastStatus = "Aborted";
      log.debug(`Entity ${runner.entity}: aborted task on node ${active.nodeId}`);
      return this.finish(runner, active.nodeId, "Aborted");
    }

    const node = runner.template.getNode(nodeId);
    if (!node) {
      log.error(`Entity ${runner.entity}: node ${nodeId} does not exist in "${runner.template.name}"`);
      runner.abortActive();
      runner.lastStatus = "Failure";
      runner.stateTimer = 0;
      runner.currentNodeId = NODE_NONE;
      return this.finish(runner, nodeId, "Failure");
    }

    if (runner.active && runner.active.nodeId !== nodeId) {
      log.debug(`Entity ${runner.entity}: cursor moved off node ${runner.active.nodeId}; aborting its task`);
      runner.abortActive();
    }

    if (node.kind === "Root") {
      runner.currentNodeId = node.nextOnSuccess;
      return this.finish(runner, nodeId, "Success");
    }

    try {
      return this.dispatch(runner, node, deltaTime);
    } catch (err) {
      if (err instanceof DispatchError) {
        log.warn(`Entity ${runner.entity}: node ${nodeId}: ${err.message}`);
      } else {
        log.error(`Entity ${runner.entity}: task on node ${nodeId} threw: ${errorMessage(err)}`);
      }
      runner.abortActive();
      return this.complete(runner, node, "Failure");
    }
  }

  private dispatch(runner: TaskRunner, node: TaskNodeDefinition, deltaTime: number): StepResult {
    if (node.kind !== "AtomicTask") {
      throw new DispatchError(`${node.kind} nodes cannot be executed directly`);
    }

    let params: ParameterMap;
    try {
      params = resolveParameters(node, runner);
    } catch (err) {
      if (err instanceof BlackboardError) throw new DispatchError(err.message);
      throw err;
    }

    let active = runner.active;
    if (!active) {
      const taskId = node.atomicTaskId ?? "";
      const task = this.registry.create(taskId);
      if (!task) {
        throw new DispatchError(`Unknown task id "${taskId}"`);
      }
      active = { nodeId: node.id, task };
      runner.active = active;
    }

    const status = active.task.execute(params, {
      entity: runner.entity,
      blackboard: runner.blackboard,
      deltaTime,
      stateTimer: runner.stateTimer,
      world: runner.world,
    });

    if (status === "Running") {
      runner.stateTimer += deltaTime;
      return this.finish(runner, node.id, "Running");
    }

    // Finished on its own terms: released without abort().
    runner.active = null;
    return this.complete(runner, node, status);
  }

  private complete(runner: TaskRunner, node: TaskNodeDefinition, status: "Success" | "Failure"): StepResult {
    runner.lastStatus = status;
    runner.stateTimer = 0;
    runner.currentNodeId = status === "Success" ? node.nextOnSuccess : node.nextOnFailure;
    return this.finish(runner, node.id, status);
  }

  private finish(runner: TaskRunner, nodeId: NodeId, status: ExecutorStep["status"]): StepResult {
    if (this.observer) {
      this.observer({ entity: runner.entity, nodeId, status, blackboard: runner.blackboard.snapshot() });
    }
    return { entity: runner.entity, nodeId, outcome: status, nextNodeId: runner.currentNodeId };
  }
}
