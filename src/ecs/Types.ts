export type EntityId = number;

export type Entity = Readonly<{
    id: EntityId;
}>;

/**
 * Internal numeric id for a component "type".
 * Doubles as the bit index inside a {@link Signature}.
 */
export type TypeId = number;

/** Unsigned 32-bit mask, one bit per component type id. */
export type Signature = number;

/**
 * A component class. Components are plain data; the class itself is the key
 * the coordinator uses to find the component's type id and pool.
 */
export type ComponentCtor<T = unknown> = abstract new (...args: never[]) => T;

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export type CoordinatorOptions = Readonly<{
    /** Number of distinct component types this coordinator accepts. 1..32, defaults to 32. */
    maxComponents?: number;

    /** Defaults to `console`. */
    logger?: Logger;

    /** Emit debug lines for entity lifecycle and reconciliation. Defaults to false. */
    debug?: boolean;
}>;

export type CoordinatorStats = Readonly<{
    liveEntities: number;
    pendingCreate: number;
    pendingRefresh: number;
    pendingDestroy: number;
    freeIds: number;
    componentTypes: number;
    pools: number;
    systems: number;
    tags: number;
    groups: number;
}>;
