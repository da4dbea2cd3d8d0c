import type { Vector3 } from "../values/vector.js";

export type PositionComponent = {
  position: Vector3;
};

export type MovementComponent = {
  velocity: Vector3;
};

/**
 * The slice of an entity's components that tasks may touch. Hosts attach
 * one to a runner; tasks fall back to the blackboard when it is absent.
 */
export type TaskWorldFacade = {
  position?: PositionComponent;
  movement?: MovementComponent;
};
