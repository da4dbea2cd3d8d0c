import { createLogger } from "../../utils/logger.js";
import { formatValue, valuesEqual, type TaskValue } from "../../values/task-value.js";
import { stringParam } from "../params.js";
import type { AtomicTask, AtomicTaskContext, ParameterMap, TaskStatus } from "../task.js";

const log = createLogger("Compare");

export const COMPARE_OPERATORS = ["==", "!=", "<", "<=", ">", ">="] as const;

export type CompareOperator = (typeof COMPARE_OPERATORS)[number];

function isCompareOperator(op: string): op is CompareOperator {
  return (COMPARE_OPERATORS as readonly string[]).includes(op);
}

function numeric(v: TaskValue): number | undefined {
  return v.type === "Int" || v.type === "Float" ? v.value : undefined;
}

/**
 * Evaluate `lhs op rhs`. Undefined when the pair cannot be compared:
 * differing types, or an ordering operator on a non-numeric type.
 */
export function compareValues(lhs: TaskValue, rhs: TaskValue, op: CompareOperator): boolean | undefined {
  if (lhs.type !== rhs.type) return undefined;

  switch (op) {
    case "==":
      return valuesEqual(lhs, rhs);
    case "!=":
      return !valuesEqual(lhs, rhs);
  }

  const l = numeric(lhs);
  const r = numeric(rhs);
  if (l === undefined || r === undefined) return undefined;

  switch (op) {
    case "<":
      return l < r;
    case "<=":
      return l <= r;
    case ">":
      return l > r;
    case ">=":
      return l >= r;
  }
}

/** Success when `LHS Operator RHS` holds, Failure otherwise or when it cannot be evaluated. */
export class CompareTask implements AtomicTask {
  execute(params: ParameterMap, _ctx: AtomicTaskContext): TaskStatus {
    const op = stringParam(params, "Operator");
    if (op === undefined || !isCompareOperator(op)) {
      log.warn(`Missing or invalid 'Operator' parameter: ${op ?? "(none)"}`);
      return "Failure";
    }

    const lhs = params.get("LHS");
    const rhs = params.get("RHS");
    if (!lhs || !rhs) {
      log.warn("Missing 'LHS' or 'RHS' parameter");
      return "Failure";
    }

    const result = compareValues(lhs, rhs, op);
    if (result === undefined) {
      log.warn(`Cannot compare ${lhs.type} ${op} ${rhs.type}`);
      return "Failure";
    }

    log.debug(`${formatValue(lhs)} ${op} ${formatValue(rhs)} -> ${result}`);
    return result ? "Success" : "Failure";
  }

  abort(): void {}
}
