import { ValidationError } from "../errors.js";
import {
  NODE_NONE,
  type NodeId,
  type TaskGraphTemplateInit,
  type TaskNodeDefinition,
  type VariableDefinition,
} from "./types.js";

/**
 * Immutable task graph asset shared by every runner bound to it.
 *
 * Holds the blackboard schema, the flat node table and an id → node
 * lookup that is built once here and never changes afterwards.
 */
export class TaskGraphTemplate {
  readonly name: string;
  readonly description: string;
  readonly rootNodeId: NodeId;
  readonly variables: readonly VariableDefinition[];
  readonly nodes: readonly TaskNodeDefinition[];

  private readonly lookup: ReadonlyMap<NodeId, TaskNodeDefinition>;

  constructor(init: TaskGraphTemplateInit) {
    this.name = init.name;
    this.description = init.description ?? "";
    this.rootNodeId = init.rootNodeId;
    this.variables = Object.freeze(
      (init.variables ?? []).map((v) => Object.freeze({ ...v, isLocal: v.isLocal ?? true })),
    );
    this.nodes = Object.freeze(
      init.nodes.map((n) =>
        Object.freeze({
          id: n.id,
          name: n.name ?? "",
          kind: n.kind,
          children: Object.freeze([...(n.children ?? [])]),
          atomicTaskId: n.atomicTaskId,
          parameters: Object.freeze({ ...(n.parameters ?? {}) }),
          nextOnSuccess: n.nextOnSuccess ?? NODE_NONE,
          nextOnFailure: n.nextOnFailure ?? NODE_NONE,
        }),
      ),
    );

    const lookup = new Map<NodeId, TaskNodeDefinition>();
    for (const node of this.nodes) {
      // First definition wins; duplicates are reported by validate().
      if (!lookup.has(node.id)) lookup.set(node.id, node);
    }
    this.lookup = lookup;
  }

  getNode(id: NodeId): TaskNodeDefinition | undefined {
    return this.lookup.get(id);
  }

  getRootNode(): TaskNodeDefinition | undefined {
    return this.lookup.get(this.rootNodeId);
  }

  getVariable(name: string): VariableDefinition | undefined {
    return this.variables.find((v) => v.name === name);
  }

  /** Structural problems, empty when the template is sound. */
  validate(): string[] {
    const problems: string[] = [];

    if (this.nodes.length === 0) {
      problems.push("Template has no nodes");
    }

    const seen = new Set<NodeId>();
    for (const node of this.nodes) {
      if (seen.has(node.id)) problems.push(`Duplicate node id ${node.id}`);
      seen.add(node.id);
    }

    if (!this.lookup.has(this.rootNodeId)) {
      problems.push(`Root node ${this.rootNodeId} does not exist`);
    }

    const resolves = (id: NodeId): boolean => id === NODE_NONE || this.lookup.has(id);

    for (const node of this.nodes) {
      for (const child of node.children) {
        if (!this.lookup.has(child)) {
          problems.push(`Node ${node.id} references unknown child ${child}`);
        }
      }
      if (!resolves(node.nextOnSuccess)) {
        problems.push(`Node ${node.id} has unknown nextOnSuccess target ${node.nextOnSuccess}`);
      }
      if (!resolves(node.nextOnFailure)) {
        problems.push(`Node ${node.id} has unknown nextOnFailure target ${node.nextOnFailure}`);
      }
      if (node.kind === "AtomicTask" && !node.atomicTaskId) {
        problems.push(`AtomicTask node ${node.id} has no task id`);
      }
      if (node.kind === "Decorator" && node.children.length !== 1) {
        problems.push(`Decorator node ${node.id} must have exactly one child (has ${node.children.length})`);
      }
    }

    const names = new Set<string>();
    for (const variable of this.variables) {
      if (variable.name.length === 0) problems.push("Variable with empty name");
      if (names.has(variable.name)) problems.push(`Duplicate variable "${variable.name}"`);
      names.add(variable.name);
      if (variable.defaultValue.type !== variable.type) {
        problems.push(
          `Variable "${variable.name}" is declared ${variable.type} but its default is ${variable.defaultValue.type}`,
        );
      }
    }

    return problems;
  }
}

/** Build a template and reject it if it is structurally unsound. */
export function createTaskGraphTemplate(init: TaskGraphTemplateInit): TaskGraphTemplate {
  const template = new TaskGraphTemplate(init);
  const problems = template.validate();
  if (problems.length > 0) {
    throw new ValidationError(
      "INVALID_TEMPLATE",
      `Task graph "${template.name}" is invalid: ${problems[0]}`,
      problems,
    );
  }
  return template;
}
