import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParseError, TaskSystemError, ValidationError } from "../src/errors.js";
import { loadTemplateFromFile, loadTemplateFromJson, loadTemplateFromObject } from "../src/graph/loader.js";
import { fromVariable, literal } from "../src/graph/types.js";
import { setLogSink } from "../src/utils/logger.js";
import {
  boolValue,
  entityValue,
  floatValue,
  intValue,
  stringValue,
  vectorValue,
} from "../src/values/task-value.js";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function v3(nodes: unknown[], localVariables: unknown[] = []): unknown {
  return { schema_version: 3, name: "inline", data: { rootNodeId: 1, localVariables, nodes } };
}

beforeEach(() => {
  setLogSink(() => {});
});

afterEach(() => {
  setLogSink(null);
});

describe("loadTemplateFromFile (schema v3)", () => {
  it("reads variables with their defaults", () => {
    const { template } = loadTemplateFromFile(fixture("patrol.v3.json"));
    expect(template.name).toBe("Patrol");
    expect(template.description).toBe("Walk to a point, wait, flag arrival");
    expect(template.variables).toEqual([
      { name: "Position", type: "Vector", defaultValue: vectorValue({ x: 0, y: 0, z: 0 }), isLocal: true },
      { name: "Result", type: "Bool", defaultValue: boolValue(false), isLocal: true },
      { name: "Owner", type: "EntityId", defaultValue: entityValue(12n), isLocal: true },
      { name: "Path", type: "String", defaultValue: stringValue(""), isLocal: false },
    ]);
  });

  it("maps node types and parameters", () => {
    const { template } = loadTemplateFromFile(fixture("patrol.v3.json"));
    expect(template.getNode(0)?.kind).toBe("Root");
    expect(template.getNode(1)).toMatchObject({
      kind: "AtomicTask",
      atomicTaskId: "Task_MoveToLocation",
      parameters: {
        Target: literal(vectorValue({ x: 5, y: 0, z: 0 })),
        Speed: literal(floatValue(100)),
      },
      nextOnSuccess: 2,
    });
    expect(template.getNode(2)?.parameters.Duration).toEqual(literal(floatValue(0.05)));
    expect(template.getNode(3)?.parameters.Value).toEqual(literal(boolValue(true)));
  });

  it("turns decorator fields into a child and a repeatCount parameter", () => {
    const { template } = loadTemplateFromFile(fixture("patrol.v3.json"));
    expect(template.getNode(4)).toMatchObject({
      kind: "Decorator",
      children: [2],
      parameters: { repeatCount: literal(intValue(2)) },
    });
  });

  it("warns about unknown node types and keeps them as unknown tasks", () => {
    const { template, warnings } = loadTemplateFromFile(fixture("patrol.v3.json"));
    expect(warnings).toEqual(['Node 5 has unknown type "Teleport"; treating as AtomicTask "unknown"']);
    expect(template.getNode(5)).toMatchObject({ kind: "AtomicTask", atomicTaskId: "unknown" });
  });

  it("reports a missing file with FILE_NOT_FOUND", () => {
    expect(() => loadTemplateFromFile(fixture("missing.json"))).toThrow(TaskSystemError);
    try {
      loadTemplateFromFile(fixture("missing.json"));
    } catch (err) {
      expect(err).toMatchObject({ code: "FILE_NOT_FOUND" });
    }
  });
});

describe("loadTemplateFromFile (schema v2)", () => {
  it("reads behaviour tree node types", () => {
    const { template, warnings } = loadTemplateFromFile(fixture("guard.v2.json"));
    expect(warnings).toEqual(["Skipping variable with empty name"]);
    expect(template.variables.map((v) => v.name)).toEqual(["Alert"]);
    expect(template.getNode(1)).toMatchObject({ kind: "Sequence", children: [2, 3] });
    expect(template.getNode(2)).toMatchObject({
      kind: "AtomicTask",
      atomicTaskId: "Compare",
      parameters: {
        LHS: fromVariable("Alert"),
        RHS: literal(intValue(2)),
        Operator: literal(stringValue(">")),
      },
    });
    expect(template.getNode(3)?.atomicTaskId).toBe("Task_LogMessage");
  });

  it("takes a repeater's child from decoratorChildId only", () => {
    const { template } = loadTemplateFromFile(fixture("guard.v2.json"));
    expect(template.getNode(4)).toMatchObject({
      kind: "Decorator",
      children: [3],
      parameters: { repeatCount: literal(intValue(5)) },
    });
  });
});

describe("loadTemplateFromObject", () => {
  it("reads whole JSON numbers as Int and fractional ones as Float", () => {
    const { template } = loadTemplateFromObject(
      v3([{ id: 1, type: "AtomicTask", atomicTaskId: "Wait", parameters: { A: 1, B: 1.5 } }]),
    );
    expect(template.getNode(1)?.parameters).toEqual({
      A: literal(intValue(1)),
      B: literal(floatValue(1.5)),
    });
  });

  it("accepts vectors written as arrays", () => {
    const { template } = loadTemplateFromObject(
      v3([{ id: 1, type: "AtomicTask", atomicTaskId: "MoveToLocation", parameters: { Target: [1, 2, 3] } }]),
    );
    expect(template.getNode(1)?.parameters.Target).toEqual(literal(vectorValue({ x: 1, y: 2, z: 3 })));
  });

  it("rejects a typed literal that does not fit its type", () => {
    const doc = v3([
      {
        id: 1,
        type: "AtomicTask",
        atomicTaskId: "Wait",
        parameters: { Count: { bindingType: "Literal", type: "Int", value: 1.5 } },
      },
    ]);
    expect(() => loadTemplateFromObject(doc)).toThrow('node 1 parameter "Count": 1.5 is not a valid Int');
  });

  it("reports whole numbers outside the Int range with their location", () => {
    const inferred = v3([{ id: 1, type: "AtomicTask", atomicTaskId: "Wait", parameters: { Count: 3000000000 } }]);
    expect(() => loadTemplateFromObject(inferred)).toThrow(ParseError);
    expect(() => loadTemplateFromObject(inferred)).toThrow('node 1 parameter "Count": 3000000000 is outside the Int range');

    const typed = v3(
      [{ id: 1, type: "AtomicTask", atomicTaskId: "Wait" }],
      [{ name: "Big", type: "Int", defaultValue: -2147483649 }],
    );
    expect(() => loadTemplateFromObject(typed)).toThrow('variable "Big": -2147483649 is not a valid Int');
  });

  it("rejects a variable default of the wrong type", () => {
    const doc = v3([{ id: 1, type: "AtomicTask", atomicTaskId: "Wait" }], [{ name: "N", type: "Bool", defaultValue: 1 }]);
    expect(() => loadTemplateFromObject(doc)).toThrow(ParseError);
  });

  it("fails validation for an AtomicTask without a task id", () => {
    expect(() => loadTemplateFromObject(v3([{ id: 1, type: "AtomicTask" }]))).toThrow(ValidationError);
  });

  it("fails validation for a dangling transition", () => {
    const doc = v3([{ id: 1, type: "AtomicTask", atomicTaskId: "Wait", nextOnSuccess: 7 }]);
    expect(() => loadTemplateFromObject(doc)).toThrow("Node 1 has unknown nextOnSuccess target 7");
  });

  it("rejects documents without a data section", () => {
    expect(() => loadTemplateFromObject({ name: "nothing" })).toThrow(ParseError);
    expect(() => loadTemplateFromObject({ name: "nothing" })).toThrow(/data: Required/);
  });

  it("reads an unknown schema version as version 2 with a warning", () => {
    const { template, warnings } = loadTemplateFromObject({
      schema_version: 7,
      name: "future",
      data: { rootNodeId: 1, nodes: [{ id: 1, type: "Action", actionType: "LogMessage" }] },
    });
    expect(warnings).toEqual(["Unsupported schema_version 7; reading as version 2"]);
    expect(template.getNode(1)?.atomicTaskId).toBe("LogMessage");
  });
});

describe("loadTemplateFromJson", () => {
  it("rejects text that is not JSON", () => {
    expect(() => loadTemplateFromJson("{ nope")).toThrow(/^Task graph is not valid JSON/);
  });

  it("loads a JSON string", () => {
    const text = JSON.stringify(v3([{ id: 1, type: "AtomicTask", atomicTaskId: "LogMessage" }]));
    expect(loadTemplateFromJson(text).template.name).toBe("inline");
  });
});
