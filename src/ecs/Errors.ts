/**
 * Error codes raised by the coordinator and its indexes.
 */
export type EcsErrorCode =
    | "CONFIG_INVALID"
    | "CAPACITY_EXCEEDED"
    | "ENTITY_NOT_FOUND"
    | "COMPONENT_NOT_FOUND"
    | "SYSTEM_NOT_FOUND"
    | "SYSTEM_NOT_UPDATABLE"
    | "SYSTEM_LOCKED"
    | "TAG_NOT_FOUND";

/**
 * Synchronous, local failure of an ECS operation. Nothing in the core catches
 * these; the caller decides whether to log and continue or abort.
 *
 * @example
 * ```ts
 * try {
 *     coordinator.getComponent(e, Health);
 * } catch (err) {
 *     if (err instanceof EcsError && err.code === "COMPONENT_NOT_FOUND") { ... }
 * }
 * ```
 */
export class EcsError extends Error
{
    readonly name = "EcsError";

    constructor(
        public readonly code: EcsErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>
    )
    {
        super(message);

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, EcsError);
        }
    }

    static configInvalid(message: string, details?: Record<string, unknown>): EcsError
    {
        return new EcsError("CONFIG_INVALID", message, details);
    }

    static capacityExceeded(type: string, capacity: number): EcsError
    {
        return new EcsError(
            "CAPACITY_EXCEEDED",
            `Cannot register component ${type}: capacity of ${capacity} component types exceeded`,
            { type, capacity }
        );
    }

    static entityNotFound(entityId: number, op: string): EcsError
    {
        return new EcsError("ENTITY_NOT_FOUND", `${op}: entity ${entityId} was never created or has been recycled`, { entityId });
    }

    static componentNotFound(entityId: number, type: string): EcsError
    {
        return new EcsError("COMPONENT_NOT_FOUND", `Entity ${entityId} has no ${type} component`, { entityId, type });
    }

    static systemNotFound(type: string): EcsError
    {
        return new EcsError("SYSTEM_NOT_FOUND", `System ${type} is not registered`, { type });
    }

    static systemNotUpdatable(type: string): EcsError
    {
        return new EcsError("SYSTEM_NOT_UPDATABLE", `System ${type} has no update(coordinator, dt) method`, { type });
    }

    static systemLocked(type: string, component: string): EcsError
    {
        return new EcsError(
            "SYSTEM_LOCKED",
            `requireComponent(${component}) called on ${type} after registration; declare requirements in the constructor`,
            { type, component }
        );
    }

    static tagNotFound(tag: string): EcsError
    {
        return new EcsError("TAG_NOT_FOUND", `No entity is tagged "${tag}"`, { tag });
    }
}

/** Printable name of a component or system class. */
export function formatCtor(ctor: Function): string
{
    return ctor.name || "<anonymous>";
}
