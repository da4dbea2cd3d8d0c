export type Vector3 = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
};

export const ZERO_VECTOR: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x: number, y: number, z = 0): Vector3 {
  return { x, y, z };
}

export function add(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vector3, factor: number): Vector3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function length(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function distance(a: Vector3, b: Vector3): number {
  return length(subtract(b, a));
}

export function vectorsEqual(a: Vector3, b: Vector3): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatVector(v: Vector3): string {
  return `(${v.x},${v.y},${v.z})`;
}
