import { createLogger } from "../utils/logger.js";
import type { AtomicTask, AtomicTaskFactory } from "./task.js";

const log = createLogger("AtomicTaskRegistry");

const LEGACY_PREFIX = "Task_";

/** Strip the legacy `Task_` prefix older graphs carry on task ids. */
export function normalizeTaskId(id: string): string {
  return id.startsWith(LEGACY_PREFIX) ? id.slice(LEGACY_PREFIX.length) : id;
}

/**
 * Maps task ids to factories. One instance is passed through the system;
 * nothing registers itself as a side effect of being imported.
 */
export class AtomicTaskRegistry {
  private factories = new Map<string, AtomicTaskFactory>();

  /** Register a factory. A later registration under the same id replaces the earlier one. */
  register(id: string, factory: AtomicTaskFactory): void {
    if (this.factories.has(id)) {
      log.warn(`Task "${id}" registered again; replacing previous factory`);
    }
    this.factories.set(id, factory);
  }

  unregister(id: string): boolean {
    return this.factories.delete(id);
  }

  /** Fresh instance for `id`, or undefined when nothing is registered under it. */
  create(id: string): AtomicTask | undefined {
    const factory = this.resolve(id);
    return factory?.();
  }

  isRegistered(id: string): boolean {
    return this.resolve(id) !== undefined;
  }

  getAllTaskIds(): string[] {
    return [...this.factories.keys()].sort();
  }

  private resolve(id: string): AtomicTaskFactory | undefined {
    return this.factories.get(id) ?? this.factories.get(normalizeTaskId(id));
  }
}
