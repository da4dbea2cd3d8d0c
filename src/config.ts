import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import { TaskSystemConfigSchema } from "./schemas.js";

export type TaskSystemConfig = {
  tick: {
    /** Seconds advanced per tick when the caller does not pass one. */
    deltaTime: number;
    maxTicks: number;
  };
  movement: {
    defaultSpeed: number;
    acceptanceRadius: number;
  };
  pathfinding: {
    defaultDelaySeconds: number;
  };
  debug: {
    port: number;
    host: string;
  };
  persistence: {
    dbPath: string;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TaskSystemConfig = {
  tick: {
    deltaTime: 0.016, // ~60 fps
    maxTicks: 600,
  },
  movement: {
    defaultSpeed: 100,
    acceptanceRadius: 0.5,
  },
  pathfinding: {
    defaultDelaySeconds: 0,
  },
  debug: {
    port: 3100,
    host: "127.0.0.1",
  },
  persistence: {
    dbPath: join(homedir(), ".atomic-tasks", "snapshots.db"),
  },
};

let current: TaskSystemConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

function assertValid(config: TaskSystemConfig): void {
  const result = TaskSystemConfigSchema.safeParse(config);
  if (result.success) return;
  const issue = result.error.issues[0];
  const path = issue.path.join(".");
  throw new ConfigError(`Config value "${path}" ${issue.message}`, {
    path,
    issues: result.error.issues.length,
  });
}

/** Override config values. Each section merges with its defaults. */
export function configure(overrides: DeepPartial<TaskSystemConfig>): void {
  const merged: TaskSystemConfig = {
    tick: mergeSection(DEFAULTS.tick, overrides.tick),
    movement: mergeSection(DEFAULTS.movement, overrides.movement),
    pathfinding: mergeSection(DEFAULTS.pathfinding, overrides.pathfinding),
    debug: mergeSection(DEFAULTS.debug, overrides.debug),
    persistence: mergeSection(DEFAULTS.persistence, overrides.persistence),
  };
  assertValid(merged);
  current = merged;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskSystemConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskSystemConfig> = Object.freeze(DEFAULTS);
