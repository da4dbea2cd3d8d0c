import { z } from "zod";
import { ParseError } from "./errors.js";

// ---------------------------------------------------------------------------
// Task graph documents
// ---------------------------------------------------------------------------

/** Variable type names as authored; "EntityID" is the older spelling. */
export const VariableTypeNameSchema = z.enum(["Bool", "Int", "Float", "Vector", "EntityId", "EntityID", "String"]);

export const VectorJsonSchema = z.union([
  z.tuple([z.number(), z.number(), z.number()]),
  z.object({ x: z.number(), y: z.number(), z: z.number().default(0) }),
]);

export const VariableBindingJsonSchema = z.object({
  bindingType: z.enum(["Variable", "LocalVariable"]),
  variableName: z.string().min(1, "variableName must not be empty"),
});

export const LiteralBindingJsonSchema = z.object({
  bindingType: z.literal("Literal"),
  type: VariableTypeNameSchema.optional(),
  value: z.unknown(),
});

export const ParameterJsonSchema = z.union([
  VariableBindingJsonSchema,
  LiteralBindingJsonSchema,
  z.boolean(),
  z.number(),
  z.string(),
  VectorJsonSchema,
]);

export const VariableJsonSchema = z.object({
  name: z.string(),
  type: VariableTypeNameSchema,
  defaultValue: z.unknown().optional(),
  isLocal: z.boolean().default(true),
});

export const NodeJsonSchema = z.object({
  id: z.number().int(),
  name: z.string().default(""),
  type: z.string(),
  atomicTaskId: z.string().optional(),
  actionType: z.string().optional(),
  conditionType: z.string().optional(),
  children: z.array(z.number().int()).default([]),
  decoratorChildId: z.number().int().optional(),
  repeatCount: z.number().int().min(-2_147_483_648).max(2_147_483_647).optional(),
  parameters: z.record(ParameterJsonSchema).default({}),
  nextOnSuccess: z.number().int().default(-1),
  nextOnFailure: z.number().int().default(-1),
});

export const TaskGraphDocumentSchema = z.object({
  schema_version: z.number().int().optional(),
  name: z.string().default("Unnamed"),
  description: z.string().default(""),
  data: z.object({
    rootNodeId: z.number().int(),
    nodes: z.array(NodeJsonSchema),
    localVariables: z.array(VariableJsonSchema).default([]),
  }),
});

export type VariableTypeName = z.infer<typeof VariableTypeNameSchema>;
export type VectorJson = z.infer<typeof VectorJsonSchema>;
export type ParameterJson = z.infer<typeof ParameterJsonSchema>;
export type VariableJson = z.infer<typeof VariableJsonSchema>;
export type NodeJson = z.infer<typeof NodeJsonSchema>;
export type TaskGraphDocument = z.infer<typeof TaskGraphDocumentSchema>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const numberField = (message: string) => z.number({ invalid_type_error: message }).finite(message);
const positiveNumber = numberField("must be a positive number").positive("must be a positive number");

export const TaskSystemConfigSchema = z.object({
  tick: z.object({
    deltaTime: positiveNumber,
    maxTicks: numberField("must be a positive integer")
      .int("must be a positive integer")
      .positive("must be a positive integer"),
  }),
  movement: z.object({
    defaultSpeed: positiveNumber,
    acceptanceRadius: positiveNumber,
  }),
  pathfinding: z.object({
    defaultDelaySeconds: numberField("must not be negative").min(0, "must not be negative"),
  }),
  debug: z.object({
    port: numberField("must be a port number")
      .int("must be a port number")
      .min(0, "must be a port number")
      .max(65535, "must be a port number"),
    host: z.string().min(1, "must not be empty"),
  }),
  persistence: z.object({
    dbPath: z.string().min(1, "must not be empty"),
  }),
});

// ---------------------------------------------------------------------------
// Debug protocol
// ---------------------------------------------------------------------------

export const DebugClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("runners") }),
]);

export type DebugClientMessage = z.infer<typeof DebugClientMessageSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Parse `data` with `schema`, throwing ParseError with every issue listed. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ParseError(`Invalid ${what}: ${formatIssues(result.error)}`, {
      issues: result.error.issues.length,
    });
  }
  return result.data;
}
