import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ParseError, TaskSystemError, errorMessage } from "../errors.js";
import {
  TaskGraphDocumentSchema,
  VectorJsonSchema,
  parseOrThrow,
  type NodeJson,
  type ParameterJson,
  type TaskGraphDocument,
  type VariableJson,
  type VariableTypeName,
} from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import {
  boolValue,
  entityValue,
  floatValue,
  intValue,
  isInt32,
  stringValue,
  vectorValue,
  zeroValue,
  type TaskValue,
  type VariableType,
} from "../values/task-value.js";
import type { Vector3 } from "../values/vector.js";
import { createTaskGraphTemplate, type TaskGraphTemplate } from "./template.js";
import {
  fromVariable,
  literal,
  type ParameterBinding,
  type TaskGraphTemplateInit,
  type TaskNodeKind,
} from "./types.js";

const log = createLogger("TaskGraphLoader");

export type LoadResult = {
  template: TaskGraphTemplate;
  /** Recoverable oddities found while reading the document. */
  warnings: string[];
};

type NodeInit = TaskGraphTemplateInit["nodes"][number];
type VariableInit = NonNullable<TaskGraphTemplateInit["variables"]>[number];

const STRUCTURAL_KINDS: ReadonlyMap<string, TaskNodeKind> = new Map<string, TaskNodeKind>([
  ["Sequence", "Sequence"],
  ["Selector", "Selector"],
  ["Parallel", "Parallel"],
  ["Root", "Root"],
]);

function normalizeTypeName(name: VariableTypeName): VariableType {
  return name === "EntityID" ? "EntityId" : name;
}

function toVector(raw: unknown): Vector3 | undefined {
  const result = VectorJsonSchema.safeParse(raw);
  if (!result.success) return undefined;
  const v = result.data;
  return Array.isArray(v) ? { x: v[0], y: v[1], z: v[2] } : v;
}

function toEntityId(raw: unknown): bigint | undefined {
  if (typeof raw === "number" && Number.isSafeInteger(raw) && raw >= 0) return BigInt(raw);
  if (typeof raw === "string" && /^\d+$/.test(raw)) return BigInt(raw);
  return undefined;
}

/** Literal of a declared type. Numbers never cross between Int and Float except integers into Float. */
function typedLiteral(raw: unknown, type: VariableType, where: string): TaskValue {
  const fail = (): never => {
    throw new ParseError(`${where}: ${JSON.stringify(raw) ?? "undefined"} is not a valid ${type}`);
  };
  switch (type) {
    case "Bool":
      return typeof raw === "boolean" ? boolValue(raw) : fail();
    case "Int":
      return typeof raw === "number" && isInt32(raw) ? intValue(raw) : fail();
    case "Float":
      return typeof raw === "number" ? floatValue(raw) : fail();
    case "String":
      return typeof raw === "string" ? stringValue(raw) : fail();
    case "Vector": {
      const v = toVector(raw);
      return v ? vectorValue(v) : fail();
    }
    case "EntityId": {
      const id = toEntityId(raw);
      return id !== undefined ? entityValue(id) : fail();
    }
  }
}

/** Literal whose type is inferred from the JSON value. */
function inferredLiteral(raw: unknown, where: string): TaskValue {
  if (typeof raw === "boolean") return boolValue(raw);
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) return floatValue(raw);
    if (!isInt32(raw)) throw new ParseError(`${where}: ${raw} is outside the Int range`);
    return intValue(raw);
  }
  if (typeof raw === "string") return stringValue(raw);
  const v = toVector(raw);
  if (v) return vectorValue(v);
  throw new ParseError(`${where}: cannot infer a value type from ${JSON.stringify(raw) ?? "undefined"}`);
}

function parseParameter(raw: ParameterJson, where: string): ParameterBinding {
  if (typeof raw === "object" && !Array.isArray(raw) && "bindingType" in raw) {
    if (raw.bindingType === "Literal") {
      return literal(
        raw.type ? typedLiteral(raw.value, normalizeTypeName(raw.type), where) : inferredLiteral(raw.value, where),
      );
    }
    return fromVariable(raw.variableName);
  }
  return literal(inferredLiteral(raw, where));
}

function parseParameters(node: NodeJson): Record<string, ParameterBinding> {
  const out: Record<string, ParameterBinding> = {};
  for (const [name, raw] of Object.entries(node.parameters)) {
    out[name] = parseParameter(raw, `node ${node.id} parameter "${name}"`);
  }
  return out;
}

function parseVariables(vars: VariableJson[], warnings: string[]): VariableInit[] {
  const out: VariableInit[] = [];
  for (const v of vars) {
    if (v.name.length === 0) {
      warnings.push("Skipping variable with empty name");
      continue;
    }
    const type = normalizeTypeName(v.type);
    const defaultValue =
      v.defaultValue === undefined ? zeroValue(type) : typedLiteral(v.defaultValue, type, `variable "${v.name}"`);
    out.push({ name: v.name, type, defaultValue, isLocal: v.isLocal });
  }
  return out;
}

function unknownNode(node: NodeJson, warnings: string[]): { kind: TaskNodeKind; atomicTaskId?: string } {
  warnings.push(`Node ${node.id} has unknown type "${node.type}"; treating as AtomicTask "unknown"`);
  return { kind: "AtomicTask", atomicTaskId: "unknown" };
}

function repeatParameter(node: NodeJson): Record<string, ParameterBinding> {
  return { repeatCount: literal(intValue(node.repeatCount ?? 1)) };
}

function parseNodeV3(node: NodeJson, warnings: string[]): NodeInit {
  const base = {
    id: node.id,
    name: node.name,
    children: [...node.children],
    nextOnSuccess: node.nextOnSuccess,
    nextOnFailure: node.nextOnFailure,
  };
  const params = parseParameters(node);

  if (node.type === "AtomicTask") {
    return { ...base, kind: "AtomicTask", atomicTaskId: node.atomicTaskId ?? "", parameters: params };
  }
  const structural = STRUCTURAL_KINDS.get(node.type);
  if (structural) {
    return { ...base, kind: structural, parameters: params };
  }
  if (node.type === "Decorator") {
    const children =
      base.children.length === 0 && node.decoratorChildId !== undefined && node.decoratorChildId >= 0
        ? [node.decoratorChildId]
        : base.children;
    return { ...base, kind: "Decorator", children, parameters: { ...repeatParameter(node), ...params } };
  }
  return { ...base, ...unknownNode(node, warnings), parameters: params };
}

function parseNodeV2(node: NodeJson, warnings: string[]): NodeInit {
  const base = {
    id: node.id,
    name: node.name,
    children: [...node.children],
    nextOnSuccess: node.nextOnSuccess,
    nextOnFailure: node.nextOnFailure,
  };
  const params = parseParameters(node);

  switch (node.type) {
    case "Action":
      return { ...base, kind: "AtomicTask", atomicTaskId: node.actionType ?? "", parameters: params };
    case "Condition":
      return { ...base, kind: "AtomicTask", atomicTaskId: node.conditionType ?? "", parameters: params };
    case "Repeater": {
      const children = node.decoratorChildId !== undefined && node.decoratorChildId >= 0 ? [node.decoratorChildId] : [];
      return { ...base, kind: "Decorator", children, parameters: { ...repeatParameter(node), ...params } };
    }
    default: {
      // Root nodes only exist in version 3 documents.
      const structural = node.type === "Root" ? undefined : STRUCTURAL_KINDS.get(node.type);
      if (structural) return { ...base, kind: structural, parameters: params };
      return { ...base, ...unknownNode(node, warnings), parameters: params };
    }
  }
}

/** Convert an already validated document into a template. */
export function buildTemplate(doc: TaskGraphDocument): LoadResult {
  const warnings: string[] = [];
  const version = doc.schema_version ?? 2;
  if (version !== 2 && version !== 3) {
    warnings.push(`Unsupported schema_version ${version}; reading as version 2`);
  }
  const parseNode = version === 3 ? parseNodeV3 : parseNodeV2;

  const template = createTaskGraphTemplate({
    name: doc.name,
    description: doc.description,
    rootNodeId: doc.data.rootNodeId,
    variables: parseVariables(doc.data.localVariables, warnings),
    nodes: doc.data.nodes.map((n) => parseNode(n, warnings)),
  });

  for (const w of warnings) log.warn(w, { template: template.name });
  log.debug(`Loaded "${template.name}" with ${template.nodes.length} nodes`, { schemaVersion: version });
  return { template, warnings };
}

/** Validate and convert a parsed JSON value. */
export function loadTemplateFromObject(data: unknown): LoadResult {
  return buildTemplate(parseOrThrow(TaskGraphDocumentSchema, data, "task graph document"));
}

export function loadTemplateFromJson(text: string): LoadResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Task graph is not valid JSON: ${errorMessage(err)}`);
  }
  return loadTemplateFromObject(data);
}

export function loadTemplateFromFile(path: string): LoadResult {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, "utf8");
  } catch (err) {
    throw new TaskSystemError("FILE_NOT_FOUND", `Cannot read task graph "${fullPath}": ${errorMessage(err)}`, {
      path: fullPath,
    });
  }
  return loadTemplateFromJson(text);
}
