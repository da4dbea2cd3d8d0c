import { resolve } from "node:path";
import { TaskSystemError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { loadTemplateFromFile } from "./loader.js";
import type { TaskGraphTemplate } from "./template.js";

const log = createLogger("TaskGraphAssets");

export type AssetId = number;

export const INVALID_ASSET_ID: AssetId = 0;

/**
 * Owns loaded task graph templates and hands out numeric ids for them.
 * Files are cached by resolved path, so loading the same graph twice
 * returns the same id and the same template instance.
 */
export class TaskGraphAssetManager {
  private templates = new Map<AssetId, TaskGraphTemplate>();
  private keys = new Map<string, AssetId>();
  private nextId: AssetId = 1;

  /** Load a graph file. Returns INVALID_ASSET_ID if it cannot be read or is invalid. */
  load(path: string): AssetId {
    const key = resolve(path);
    const cached = this.keys.get(key);
    if (cached !== undefined) return cached;

    try {
      const { template } = loadTemplateFromFile(key);
      return this.register(template, key);
    } catch (err) {
      if (!(err instanceof TaskSystemError)) throw err;
      log.error(`Failed to load "${key}": ${err.message}`, { code: err.code });
      return INVALID_ASSET_ID;
    }
  }

  /**
   * Add an in-memory template. A template registered again under an
   * existing key replaces the previous one and keeps its id.
   */
  register(template: TaskGraphTemplate, key = `memory:${template.name}`): AssetId {
    const existing = this.keys.get(key);
    if (existing !== undefined) {
      this.templates.set(existing, template);
      log.debug(`Replaced asset ${existing} (${key})`);
      return existing;
    }
    const id = this.nextId++;
    this.templates.set(id, template);
    this.keys.set(key, id);
    log.debug(`Registered asset ${id} (${key})`);
    return id;
  }

  get(id: AssetId): TaskGraphTemplate | undefined {
    return this.templates.get(id);
  }

  /** Forget an asset. Runners already bound keep their reference. */
  unload(id: AssetId): boolean {
    if (!this.templates.delete(id)) return false;
    for (const [key, value] of this.keys) {
      if (value === id) this.keys.delete(key);
    }
    return true;
  }

  loadedIds(): AssetId[] {
    return [...this.templates.keys()];
  }
}
