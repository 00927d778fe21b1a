export * from "./ecs/Types";
export * from "./ecs/Errors";
export * from "./ecs/Entity";
export * from "./ecs/Signature";
export { TypeRegistry } from "./ecs/TypeRegistry";
export { Pool, isPoolOf } from "./ecs/Pool";
export type { IPool } from "./ecs/Pool";
export { System, isUpdatable } from "./ecs/System";
export type { SystemCtor, UpdatableSystem } from "./ecs/System";
export { Coordinator } from "./ecs/Coordinator";
export { Schedule } from "./ecs/Schedule";

export { TransformComponent, RigidBodyComponent } from "./physics/Components";
export { PhysicsSystem } from "./physics/PhysicsSystem";
