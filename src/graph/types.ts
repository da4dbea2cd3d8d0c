import type { TaskValue, VariableType } from "../values/task-value.js";

export type NodeId = number;

/** Cursor value meaning "no node": the graph has finished. */
export const NODE_NONE: NodeId = -1;

export type TaskNodeKind = "AtomicTask" | "Sequence" | "Selector" | "Parallel" | "Decorator" | "Root";

export type ParameterBinding =
  | { readonly kind: "literal"; readonly value: TaskValue }
  | { readonly kind: "variable"; readonly variableName: string };

export type VariableDefinition = {
  readonly name: string;
  readonly type: VariableType;
  readonly defaultValue: TaskValue;
  /** false marks a variable meant for a shared blackboard; stored locally all the same. */
  readonly isLocal: boolean;
};

export type TaskNodeDefinition = {
  readonly id: NodeId;
  readonly name: string;
  readonly kind: TaskNodeKind;
  /** Composite children, or the single decorated child. */
  readonly children: readonly NodeId[];
  /** Registry identity; set on AtomicTask nodes. */
  readonly atomicTaskId?: string;
  readonly parameters: Readonly<Record<string, ParameterBinding>>;
  readonly nextOnSuccess: NodeId;
  readonly nextOnFailure: NodeId;
};

export type TaskGraphTemplateInit = {
  name: string;
  description?: string;
  rootNodeId: NodeId;
  variables?: Array<Omit<VariableDefinition, "isLocal"> & { isLocal?: boolean }>;
  nodes: Array<
    Omit<TaskNodeDefinition, "children" | "parameters" | "name" | "nextOnSuccess" | "nextOnFailure"> & {
      name?: string;
      children?: NodeId[];
      parameters?: Record<string, ParameterBinding>;
      nextOnSuccess?: NodeId;
      nextOnFailure?: NodeId;
    }
  >;
};

export function literal(value: TaskValue): ParameterBinding {
  return { kind: "literal", value };
}

export function fromVariable(variableName: string): ParameterBinding {
  return { kind: "variable", variableName };
}
