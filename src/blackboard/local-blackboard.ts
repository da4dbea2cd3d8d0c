import { BlackboardError } from "../errors.js";
import type { VariableDefinition } from "../graph/types.js";
import { createLogger } from "../utils/logger.js";
import type { TaskValue, VariableType } from "../values/task-value.js";
import { decodeEntries, encodeEntries } from "./codec.js";

const log = createLogger("LocalBlackboard");

/** Anything carrying a blackboard schema; a TaskGraphTemplate in practice. */
export type BlackboardSchema = {
  readonly name: string;
  readonly variables: readonly VariableDefinition[];
};

export type SkippedEntry = {
  name: string;
  reason: "unknown-variable" | "type-mismatch";
  storedType: VariableType;
  declaredType?: VariableType;
};

export type RestoreReport = {
  restored: string[];
  skipped: SkippedEntry[];
  /** Set when parsing stopped before the declared entry count was read. */
  stopped?: { reason: "truncated" | "malformed"; detail: string };
};

type Slot = {
  readonly type: VariableType;
  readonly defaultValue: TaskValue;
  value: TaskValue;
};

/**
 * Typed variable store owned by a single task runner.
 *
 * Declared names, types and defaults come from the bound template. Every
 * stored value keeps its declared type: writes of another type are
 * rejected, never coerced.
 */
export class LocalBlackboard {
  private slots = new Map<string, Slot>();
  private schemaName = "";

  constructor(schema?: BlackboardSchema) {
    if (schema) this.initialize(schema);
  }

  /** Discard all state and adopt the variables declared by `schema`. */
  initialize(schema: BlackboardSchema): void {
    this.slots = new Map();
    this.schemaName = schema.name;
    for (const def of schema.variables) {
      this.slots.set(def.name, { type: def.type, defaultValue: def.defaultValue, value: def.defaultValue });
    }
    log.debug(`Initialized with ${this.slots.size} variables from template "${schema.name}"`);
  }

  /** Restore every variable to its declared default. */
  reset(): void {
    for (const slot of this.slots.values()) {
      slot.value = slot.defaultValue;
    }
  }

  getValue(name: string): TaskValue {
    const slot = this.slots.get(name);
    if (!slot) {
      throw new BlackboardError("UNKNOWN_VARIABLE", name, `Unknown variable: ${name}`);
    }
    return slot.value;
  }

  setValue(name: string, value: TaskValue): void {
    const slot = this.slots.get(name);
    if (!slot) {
      throw new BlackboardError("UNKNOWN_VARIABLE", name, `Unknown variable: ${name}`);
    }
    if (value.type !== slot.type) {
      throw new BlackboardError(
        "TYPE_MISMATCH",
        name,
        `Type mismatch for variable ${name}: declared ${slot.type}, got ${value.type}`,
      );
    }
    slot.value = value;
  }

  hasVariable(name: string): boolean {
    return this.slots.has(name);
  }

  getDeclaredType(name: string): VariableType | undefined {
    return this.slots.get(name)?.type;
  }

  getVariableNames(): string[] {
    return [...this.slots.keys()];
  }

  get size(): number {
    return this.slots.size;
  }

  /** Point-in-time copy of every current value. */
  snapshot(): Readonly<Record<string, TaskValue>> {
    const out: Record<string, TaskValue> = {};
    for (const [name, slot] of this.slots) {
      out[name] = slot.value;
    }
    return Object.freeze(out);
  }

  serialize(): Buffer {
    return encodeEntries([...this.slots].map(([name, slot]) => ({ name, value: slot.value })));
  }

  /**
   * Restore values written by serialize() into the current schema.
   * Unknown names and type mismatches are skipped; a damaged tail stops
   * the restore but keeps what was read before it.
   */
  deserialize(bytes: Uint8Array): RestoreReport {
    const report: RestoreReport = { restored: [], skipped: [] };

    for (const entry of decodeEntries(bytes)) {
      if (entry.kind === "stop") {
        report.stopped = { reason: entry.reason, detail: entry.detail };
        log.warn(`Restore stopped early: ${entry.detail}`, { template: this.schemaName });
        break;
      }

      const slot = this.slots.get(entry.name);
      if (!slot) {
        report.skipped.push({ name: entry.name, reason: "unknown-variable", storedType: entry.value.type });
        log.warn(`Skipping unknown variable "${entry.name}"`, { template: this.schemaName });
        continue;
      }
      if (slot.type !== entry.value.type) {
        report.skipped.push({
          name: entry.name,
          reason: "type-mismatch",
          storedType: entry.value.type,
          declaredType: slot.type,
        });
        log.warn(`Skipping "${entry.name}": stored ${entry.value.type}, declared ${slot.type}`, {
          template: this.schemaName,
        });
        continue;
      }

      slot.value = entry.value;
      report.restored.push(entry.name);
    }

    return report;
  }
}
