import type { RestoreReport } from "./blackboard/local-blackboard.js";
import { getConfig } from "./config.js";
import { TaskSystemError } from "./errors.js";
import { TaskExecutor } from "./executor/executor.js";
import type { ExecutorObserver, StepResult } from "./executor/types.js";
import { TaskGraphAssetManager, type AssetId } from "./graph/asset-manager.js";
import { TaskGraphTemplate } from "./graph/template.js";
import { PathfindingManager } from "./pathfinding/manager.js";
import type { SnapshotStore } from "./persistence/store.js";
import { TaskRunner } from "./runtime/runner.js";
import type { TaskWorldFacade } from "./runtime/world.js";
import { registerBuiltinTasks } from "./tasks/builtin/index.js";
import { AtomicTaskRegistry } from "./tasks/registry.js";
import { createLogger } from "./utils/logger.js";
import type { EntityId } from "./values/task-value.js";

const log = createLogger("TaskSystem");

export type TaskSystemOptions = {
  registry?: AtomicTaskRegistry;
  assets?: TaskGraphAssetManager;
  pathfinding?: PathfindingManager;
  observer?: ExecutorObserver;
  /** Register the built-in tasks into the registry (default true). */
  registerBuiltins?: boolean;
};

export type SpawnOptions = {
  world?: TaskWorldFacade;
};

export type RunOptions = {
  deltaTime?: number;
  maxTicks?: number;
};

export type RunSummary = {
  ticks: number;
  /** True when every runner finished before maxTicks. */
  idle: boolean;
};

/**
 * Owns the registry, the template assets, the executor and one task
 * runner per entity, and ticks them together.
 */
export class TaskSystem {
  readonly registry: AtomicTaskRegistry;
  readonly assets: TaskGraphAssetManager;
  readonly pathfinding: PathfindingManager;
  readonly executor: TaskExecutor;

  private runnerMap = new Map<EntityId, TaskRunner>();

  constructor(opts: TaskSystemOptions = {}) {
    this.registry = opts.registry ?? new AtomicTaskRegistry();
    this.assets = opts.assets ?? new TaskGraphAssetManager();
    this.pathfinding = opts.pathfinding ?? new PathfindingManager();
    this.executor = new TaskExecutor(this.registry, { observer: opts.observer });

    if (opts.registerBuiltins !== false) {
      const config = getConfig();
      registerBuiltinTasks(this.registry, {
        pathfinding: this.pathfinding,
        movement: { ...config.movement },
        pathfindingDelaySeconds: config.pathfinding.defaultDelaySeconds,
      });
    }
  }

  setObserver(observer: ExecutorObserver | undefined): void {
    this.executor.setObserver(observer);
  }

  /** Start running a graph for `entity`, replacing any runner it already has. */
  spawn(entity: EntityId, source: TaskGraphTemplate | AssetId, opts: SpawnOptions = {}): TaskRunner {
    const template = this.resolveTemplate(source);
    if (this.runnerMap.has(entity)) {
      log.warn(`Entity ${entity} already has a runner; replacing it`);
      this.despawn(entity);
    }
    const runner = new TaskRunner(entity, template, opts.world);
    this.runnerMap.set(entity, runner);
    log.debug(`Spawned runner for entity ${entity}`, { template: template.name });
    return runner;
  }

  /** Remove an entity's runner, aborting its active task. */
  despawn(entity: EntityId): boolean {
    const runner = this.runnerMap.get(entity);
    if (!runner) return false;
    runner.abortActive();
    this.runnerMap.delete(entity);
    return true;
  }

  /** Stop an entity's graph; the abort happens on the next tick. */
  interrupt(entity: EntityId): boolean {
    const runner = this.runnerMap.get(entity);
    if (!runner) return false;
    runner.interrupt();
    return true;
  }

  /** Restart an entity's graph from the root, optionally on another template. */
  rebind(entity: EntityId, source?: TaskGraphTemplate | AssetId): boolean {
    const runner = this.runnerMap.get(entity);
    if (!runner) return false;
    runner.bind(source === undefined ? runner.template : this.resolveTemplate(source));
    return true;
  }

  getRunner(entity: EntityId): TaskRunner | undefined {
    return this.runnerMap.get(entity);
  }

  runners(): TaskRunner[] {
    return [...this.runnerMap.values()];
  }

  tick(deltaTime = getConfig().tick.deltaTime): StepResult[] {
    return this.executor.tick(this.runnerMap.values(), deltaTime);
  }

  /** Tick until every runner has finished or maxTicks is reached. */
  runUntilIdle(opts: RunOptions = {}): RunSummary {
    const deltaTime = opts.deltaTime ?? getConfig().tick.deltaTime;
    const maxTicks = opts.maxTicks ?? getConfig().tick.maxTicks;
    let ticks = 0;
    while (ticks < maxTicks && !this.isIdle()) {
      this.tick(deltaTime);
      ticks++;
    }
    return { ticks, idle: this.isIdle() };
  }

  isIdle(): boolean {
    for (const runner of this.runnerMap.values()) {
      if (!runner.finished) return false;
    }
    return true;
  }

  saveSnapshots(store: SnapshotStore): number {
    return store.saveMany(this.runners().map((r) => r.snapshot()));
  }

  /** Restore one entity from the store. Undefined when either side is missing. */
  restoreSnapshot(store: SnapshotStore, entity: EntityId): RestoreReport | undefined {
    const runner = this.runnerMap.get(entity);
    const snapshot = store.get(entity);
    if (!runner || !snapshot) return undefined;
    return runner.restore(snapshot);
  }

  /** Abort every active task and drop all runners and pending path requests. */
  shutdown(): void {
    for (const runner of this.runnerMap.values()) runner.abortActive();
    this.runnerMap.clear();
    this.pathfinding.dispose();
  }

  private resolveTemplate(source: TaskGraphTemplate | AssetId): TaskGraphTemplate {
    if (source instanceof TaskGraphTemplate) return source;
    const template = this.assets.get(source);
    if (!template) {
      throw new TaskSystemError("INVALID_TEMPLATE", `No task graph asset with id ${source}`, { assetId: source });
    }
    return template;
  }
}

