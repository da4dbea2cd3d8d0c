import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LocalBlackboard } from "../src/blackboard/local-blackboard.js";
import type { VariableDefinition } from "../src/graph/types.js";
import { PathfindingManager } from "../src/pathfinding/manager.js";
import type { TaskWorldFacade } from "../src/runtime/world.js";
import { CompareTask, compareValues } from "../src/tasks/builtin/compare.js";
import { LogMessageTask } from "../src/tasks/builtin/log-message.js";
import { MoveToLocationTask } from "../src/tasks/builtin/move-to-location.js";
import { RequestPathfindingTask } from "../src/tasks/builtin/request-pathfinding.js";
import { SetVariableTask } from "../src/tasks/builtin/set-variable.js";
import { WaitTask } from "../src/tasks/builtin/wait.js";
import type { AtomicTaskContext, ParameterMap } from "../src/tasks/task.js";
import { setLogSink, type LogLevel } from "../src/utils/logger.js";
import {
  boolValue,
  floatValue,
  intValue,
  stringValue,
  vectorValue,
  type TaskValue,
} from "../src/values/task-value.js";
import { ZERO_VECTOR } from "../src/values/vector.js";

function params(entries: Record<string, TaskValue> = {}): ParameterMap {
  return new Map(Object.entries(entries));
}

function board(values: Record<string, TaskValue>): LocalBlackboard {
  const variables: VariableDefinition[] = Object.entries(values).map(([name, defaultValue]) => ({
    name,
    type: defaultValue.type,
    defaultValue,
    isLocal: true,
  }));
  return new LocalBlackboard({ name: "test", variables });
}

function ctx(overrides: Partial<AtomicTaskContext> = {}): AtomicTaskContext {
  return { entity: 1n, deltaTime: 0.016, stateTimer: 0, ...overrides };
}

const MOVEMENT = { defaultSpeed: 100, acceptanceRadius: 0.5 };

beforeEach(() => {
  setLogSink(() => {});
});

afterEach(() => {
  setLogSink(null);
});

describe("WaitTask", () => {
  it("runs until the state timer reaches Duration", () => {
    const task = new WaitTask();
    const p = params({ Duration: floatValue(1) });
    expect(task.execute(p, ctx({ stateTimer: 0 }))).toBe("Running");
    expect(task.execute(p, ctx({ stateTimer: 0.99 }))).toBe("Running");
    expect(task.execute(p, ctx({ stateTimer: 1 }))).toBe("Success");
  });

  it("accepts a whole-number Duration", () => {
    const task = new WaitTask();
    const p = params({ Duration: intValue(2) });
    expect(task.execute(p, ctx({ stateTimer: 1 }))).toBe("Running");
    expect(task.execute(p, ctx({ stateTimer: 2 }))).toBe("Success");
  });

  it("fails without a positive numeric Duration", () => {
    const task = new WaitTask();
    expect(task.execute(params(), ctx())).toBe("Failure");
    expect(task.execute(params({ Duration: stringValue("1") }), ctx())).toBe("Failure");
    expect(task.execute(params({ Duration: intValue(0) }), ctx())).toBe("Failure");
    expect(task.execute(params({ Duration: floatValue(0) }), ctx())).toBe("Failure");
    expect(task.execute(params({ Duration: floatValue(-2) }), ctx())).toBe("Failure");
  });
});

describe("MoveToLocationTask", () => {
  it("steps the Position variable and snaps onto the target", () => {
    const bb = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
    const task = new MoveToLocationTask(MOVEMENT);
    const p = params({ Target: vectorValue({ x: 5, y: 0, z: 0 }) });

    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    const first = bb.getValue("Position");
    expect(first.type === "Vector" ? first.value.x : NaN).toBeCloseTo(1.6, 6);

    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Success");
    expect(bb.getValue("Position")).toEqual(vectorValue({ x: 5, y: 0, z: 0 }));
  });

  it("arrives in one step when the step covers the distance", () => {
    const bb = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
    const task = new MoveToLocationTask(MOVEMENT);
    const p = params({ Target: vectorValue({ x: 5, y: 0, z: 0 }), Speed: floatValue(500) });
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Success");
    expect(bb.getValue("Position")).toEqual(vectorValue({ x: 5, y: 0, z: 0 }));
  });

  it("accepts a whole-number Speed", () => {
    const bb = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
    const task = new MoveToLocationTask(MOVEMENT);
    const p = params({ Target: vectorValue({ x: 5, y: 0, z: 0 }), Speed: intValue(500) });
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Success");
  });

  it("falls back to the default speed when Speed is not a positive number", () => {
    const task = new MoveToLocationTask(MOVEMENT);
    const target = vectorValue({ x: 5, y: 0, z: 0 });
    for (const speed of [floatValue(-500), intValue(0), stringValue("fast")]) {
      const bb = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
      expect(task.execute(params({ Target: target, Speed: speed }), ctx({ blackboard: bb }))).toBe("Running");
      const pos = bb.getValue("Position");
      expect(pos.type === "Vector" ? pos.value.x : NaN).toBeCloseTo(1.6, 6);
    }
  });

  it("succeeds inside the acceptance radius", () => {
    const bb = board({ Position: vectorValue({ x: 4, y: 0, z: 0 }) });
    const task = new MoveToLocationTask(MOVEMENT);
    const p = params({ Target: vectorValue({ x: 5, y: 0, z: 0 }), AcceptanceRadius: floatValue(2) });
    expect(task.execute(p, ctx({ blackboard: bb, deltaTime: 0.001 }))).toBe("Success");
  });

  it("steers by velocity when the world has position and movement", () => {
    const world: TaskWorldFacade = {
      position: { position: { x: 0, y: 0, z: 0 } },
      movement: { velocity: ZERO_VECTOR },
    };
    const task = new MoveToLocationTask(MOVEMENT);
    const p = params({ Target: vectorValue({ x: 10, y: 0, z: 0 }) });

    expect(task.execute(p, ctx({ world }))).toBe("Running");
    expect(world.movement?.velocity).toEqual({ x: 100, y: 0, z: 0 });

    world.position = { position: { x: 9.8, y: 0, z: 0 } };
    expect(task.execute(p, ctx({ world }))).toBe("Success");
    expect(world.movement?.velocity).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("fails without a target or a position source", () => {
    const task = new MoveToLocationTask(MOVEMENT);
    const bb = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
    expect(task.execute(params(), ctx({ blackboard: bb }))).toBe("Failure");
    expect(task.execute(params({ Target: vectorValue({ x: 1, y: 0, z: 0 }) }), ctx())).toBe("Failure");
    expect(
      task.execute(params({ Target: vectorValue({ x: 1, y: 0, z: 0 }) }), ctx({ blackboard: board({ Other: intValue(0) }) })),
    ).toBe("Failure");
  });
});

describe("SetVariableTask", () => {
  it("writes the value into the named variable", () => {
    const bb = board({ Result: boolValue(false) });
    const status = new SetVariableTask().execute(
      params({ VarName: stringValue("Result"), Value: boolValue(true) }),
      ctx({ blackboard: bb }),
    );
    expect(status).toBe("Success");
    expect(bb.getValue("Result")).toEqual(boolValue(true));
  });

  it("fails on missing or malformed parameters", () => {
    const bb = board({ Result: boolValue(false) });
    const task = new SetVariableTask();
    expect(task.execute(params({ Value: boolValue(true) }), ctx({ blackboard: bb }))).toBe("Failure");
    expect(task.execute(params({ VarName: intValue(1), Value: boolValue(true) }), ctx({ blackboard: bb }))).toBe("Failure");
    expect(task.execute(params({ VarName: stringValue("Result") }), ctx({ blackboard: bb }))).toBe("Failure");
  });

  it("fails without a blackboard, on unknown names and on type mismatch", () => {
    const bb = board({ Result: boolValue(false) });
    const task = new SetVariableTask();
    expect(task.execute(params({ VarName: stringValue("Result"), Value: boolValue(true) }), ctx())).toBe("Failure");
    expect(task.execute(params({ VarName: stringValue("Nope"), Value: boolValue(true) }), ctx({ blackboard: bb }))).toBe(
      "Failure",
    );
    expect(task.execute(params({ VarName: stringValue("Result"), Value: intValue(1) }), ctx({ blackboard: bb }))).toBe(
      "Failure",
    );
    expect(bb.getValue("Result")).toEqual(boolValue(false));
  });
});

describe("CompareTask", () => {
  const compare = (lhs: TaskValue, op: string, rhs: TaskValue) =>
    new CompareTask().execute(params({ LHS: lhs, RHS: rhs, Operator: stringValue(op) }), ctx());

  it("evaluates Int comparisons", () => {
    expect(compare(intValue(5), "==", intValue(5))).toBe("Success");
    expect(compare(intValue(5), ">", intValue(5))).toBe("Failure");
    expect(compare(intValue(5), ">=", intValue(5))).toBe("Success");
    expect(compare(intValue(4), "<", intValue(5))).toBe("Success");
  });

  it("evaluates Float comparisons", () => {
    expect(compare(floatValue(1.5), "<=", floatValue(2.5))).toBe("Success");
    expect(compare(floatValue(1.5), "!=", floatValue(1.5))).toBe("Failure");
  });

  it("fails when the operand types differ", () => {
    expect(compare(intValue(5), "==", floatValue(5))).toBe("Failure");
  });

  it("allows equality but not ordering on non-numeric types", () => {
    expect(compare(stringValue("a"), "==", stringValue("a"))).toBe("Success");
    expect(compare(stringValue("a"), "<", stringValue("b"))).toBe("Failure");
    expect(compare(boolValue(true), "!=", boolValue(false))).toBe("Success");
    expect(compare(vectorValue({ x: 1, y: 2, z: 3 }), "==", vectorValue({ x: 1, y: 2, z: 3 }))).toBe("Success");
    expect(compareValues(stringValue("a"), stringValue("b"), "<")).toBeUndefined();
  });

  it("fails on an unknown or missing operator", () => {
    expect(compare(intValue(1), "=~", intValue(1))).toBe("Failure");
    expect(new CompareTask().execute(params({ LHS: intValue(1), RHS: intValue(1) }), ctx())).toBe("Failure");
  });

  it("fails when an operand is missing", () => {
    expect(new CompareTask().execute(params({ LHS: intValue(1), Operator: stringValue("==") }), ctx())).toBe(
      "Failure",
    );
  });
});

describe("LogMessageTask", () => {
  it("logs the message and succeeds", () => {
    const lines: Array<[LogLevel, string]> = [];
    setLogSink((level, line) => lines.push([level, line]));

    const status = new LogMessageTask().execute(params({ message: stringValue("hello") }), ctx());

    expect(status).toBe("Success");
    expect(lines).toHaveLength(1);
    expect(lines[0][0]).toBe("info");
    expect(lines[0][1].endsWith('[INFO] [LogMessage] hello {"entity":"1"}')).toBe(true);
  });

  it("falls back to a placeholder message", () => {
    const lines: string[] = [];
    setLogSink((_level, line) => lines.push(line));
    expect(new LogMessageTask().execute(params(), ctx())).toBe("Success");
    expect(lines[0].endsWith('[LogMessage] (no message) {"entity":"1"}')).toBe(true);
  });
});

describe("RequestPathfindingTask", () => {
  let manager: PathfindingManager;

  beforeEach(() => {
    vi.useFakeTimers();
    manager = new PathfindingManager();
  });

  afterEach(() => {
    manager.dispose();
    vi.useRealTimers();
  });

  function pathBoard(): LocalBlackboard {
    return board({ Position: vectorValue({ x: 1, y: 2, z: 3 }), Path: stringValue("") });
  }

  it("submits once, polls, then writes the path", () => {
    const bb = pathBoard();
    const task = new RequestPathfindingTask(manager);
    const p = params({ Target: vectorValue({ x: 4, y: 5, z: 6 }), AsyncDelay: floatValue(0.5) });

    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    expect(manager.pendingCount).toBe(1);
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");

    vi.advanceTimersByTime(500);
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Success");
    expect(bb.getValue("Path")).toEqual(stringValue("(1,2,3)->(4,5,6)"));
    expect(manager.pendingCount).toBe(0);
  });

  it("finishes on the second call when there is no delay", () => {
    const bb = pathBoard();
    const task = new RequestPathfindingTask(manager);
    const p = params({ Target: vectorValue({ x: 4, y: 5, z: 6 }) });
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Success");
  });

  it("prefers an explicit Start over the Position variable", () => {
    const bb = pathBoard();
    const task = new RequestPathfindingTask(manager);
    const p = params({ Start: vectorValue({ x: 0, y: 0, z: 0 }), Target: vectorValue({ x: 1, y: 1, z: 1 }) });
    task.execute(p, ctx({ blackboard: bb }));
    task.execute(p, ctx({ blackboard: bb }));
    expect(bb.getValue("Path")).toEqual(stringValue("(0,0,0)->(1,1,1)"));
  });

  it("cancels the request on abort without touching the blackboard", () => {
    const bb = pathBoard();
    const task = new RequestPathfindingTask(manager);
    const p = params({ Target: vectorValue({ x: 4, y: 5, z: 6 }), AsyncDelay: floatValue(1) });

    expect(task.execute(p, ctx({ blackboard: bb }))).toBe("Running");
    task.abort();
    vi.advanceTimersByTime(2000);

    expect(manager.pendingCount).toBe(0);
    expect(manager.isComplete(1)).toBe(false);
    expect(bb.getValue("Path")).toEqual(stringValue(""));
  });

  it("can be aborted before it ever ran", () => {
    expect(() => new RequestPathfindingTask(manager).abort()).not.toThrow();
  });

  it("fails without a Path variable or a target", () => {
    const task = new RequestPathfindingTask(manager);
    const noPath = board({ Position: vectorValue({ x: 0, y: 0, z: 0 }) });
    expect(task.execute(params({ Target: vectorValue({ x: 1, y: 0, z: 0 }) }), ctx({ blackboard: noPath }))).toBe(
      "Failure",
    );
    expect(task.execute(params(), ctx({ blackboard: pathBoard() }))).toBe("Failure");
  });

  it("fails without a start position", () => {
    const task = new RequestPathfindingTask(manager);
    const bb = board({ Path: stringValue("") });
    expect(task.execute(params({ Target: vectorValue({ x: 1, y: 0, z: 0 }) }), ctx({ blackboard: bb }))).toBe(
      "Failure",
    );
    expect(manager.pendingCount).toBe(0);
  });
});
