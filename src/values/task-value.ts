import { ValueTypeError } from "../errors.js";
import { formatVector, vectorsEqual, type Vector3 } from "./vector.js";

export const VARIABLE_TYPES = ["Bool", "Int", "Float", "Vector", "EntityId", "String"] as const;

export type VariableType = (typeof VARIABLE_TYPES)[number];

/** Entity identifier; an unsigned 64-bit integer. */
export type EntityId = bigint;

export const INVALID_ENTITY_ID: EntityId = 0n;

/**
 * A single typed value. Exactly one variant is active; the `type` tag
 * names it. Values are immutable, so assignment replaces the whole value.
 */
export type TaskValue =
  | { readonly type: "Bool"; readonly value: boolean }
  | { readonly type: "Int"; readonly value: number }
  | { readonly type: "Float"; readonly value: number }
  | { readonly type: "Vector"; readonly value: Vector3 }
  | { readonly type: "EntityId"; readonly value: EntityId }
  | { readonly type: "String"; readonly value: string };

export type ValueOf<T extends VariableType> = Extract<TaskValue, { type: T }>["value"];

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const UINT64_MAX = 0xffff_ffff_ffff_ffffn;

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isVariableType(value: unknown): value is VariableType {
  return typeof value === "string" && (VARIABLE_TYPES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function boolValue(value: boolean): TaskValue {
  return { type: "Bool", value };
}

export function intValue(value: number): TaskValue {
  if (!isInt32(value)) {
    throw new ValueTypeError(`Int value out of range: ${value}`, { value });
  }
  return { type: "Int", value };
}

/** Floats are single precision; the value is rounded on construction. */
export function floatValue(value: number): TaskValue {
  return { type: "Float", value: Math.fround(value) };
}

/** Components are rounded to single precision like Float. */
export function vectorValue(value: Vector3): TaskValue {
  return { type: "Vector", value: { x: Math.fround(value.x), y: Math.fround(value.y), z: Math.fround(value.z) } };
}

export function entityValue(value: EntityId): TaskValue {
  if (value < 0n || value > UINT64_MAX) {
    throw new ValueTypeError(`EntityId value out of range: ${value}`, { value: value.toString() });
  }
  return { type: "EntityId", value };
}

export function stringValue(value: string): TaskValue {
  return { type: "String", value };
}

/** The value a declared variable holds when no default is given. */
export function zeroValue(type: VariableType): TaskValue {
  switch (type) {
    case "Bool":
      return boolValue(false);
    case "Int":
      return intValue(0);
    case "Float":
      return floatValue(0);
    case "Vector":
      return vectorValue({ x: 0, y: 0, z: 0 });
    case "EntityId":
      return entityValue(0n);
    case "String":
      return stringValue("");
  }
}

// ---------------------------------------------------------------------------
// Checked access
// ---------------------------------------------------------------------------

function mismatch(expected: VariableType, actual: TaskValue): ValueTypeError {
  return new ValueTypeError(`Expected ${expected} value, got ${actual.type}`, {
    expected,
    actual: actual.type,
  });
}

export function asBool(v: TaskValue): boolean {
  if (v.type !== "Bool") throw mismatch("Bool", v);
  return v.value;
}

export function asInt(v: TaskValue): number {
  if (v.type !== "Int") throw mismatch("Int", v);
  return v.value;
}

export function asFloat(v: TaskValue): number {
  if (v.type !== "Float") throw mismatch("Float", v);
  return v.value;
}

export function asVector(v: TaskValue): Vector3 {
  if (v.type !== "Vector") throw mismatch("Vector", v);
  return v.value;
}

export function asEntityId(v: TaskValue): EntityId {
  if (v.type !== "EntityId") throw mismatch("EntityId", v);
  return v.value;
}

export function asString(v: TaskValue): string {
  if (v.type !== "String") throw mismatch("String", v);
  return v.value;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Same type and same payload. Floats compare exactly. */
export function valuesEqual(a: TaskValue, b: TaskValue): boolean {
  switch (a.type) {
    case "Vector":
      return b.type === "Vector" && vectorsEqual(a.value, b.value);
    default:
      return a.type === b.type && a.value === b.value;
  }
}

export function formatValue(v: TaskValue): string {
  switch (v.type) {
    case "Vector":
      return formatVector(v.value);
    case "String":
      return JSON.stringify(v.value);
    default:
      return String(v.value);
  }
}

export type PlainValue = boolean | number | string | { x: number; y: number; z: number };

/** JSON-safe form of a value; entity ids become decimal strings. */
export function toPlainValue(v: TaskValue): { type: VariableType; value: PlainValue } {
  switch (v.type) {
    case "Vector":
      return { type: v.type, value: { x: v.value.x, y: v.value.y, z: v.value.z } };
    case "EntityId":
      return { type: v.type, value: v.value.toString() };
    default:
      return { type: v.type, value: v.value };
  }
}
