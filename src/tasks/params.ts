import type { Vector3 } from "../values/vector.js";
import type { ParameterMap } from "./task.js";

// Typed reads. A parameter of the wrong variant reads as absent.

/** Int or Float; graph files write `2.0` and `2` alike. */
export function numberParam(params: ParameterMap, name: string): number | undefined {
  const v = params.get(name);
  return v?.type === "Float" || v?.type === "Int" ? v.value : undefined;
}

export function vectorParam(params: ParameterMap, name: string): Vector3 | undefined {
  const v = params.get(name);
  return v?.type === "Vector" ? v.value : undefined;
}

export function stringParam(params: ParameterMap, name: string): string | undefined {
  const v = params.get(name);
  return v?.type === "String" ? v.value : undefined;
}
