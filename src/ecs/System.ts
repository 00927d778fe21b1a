import type { Coordinator } from "./Coordinator";
import { sameEntity } from "./Entity";
import { EcsError, formatCtor } from "./Errors";
import { EMPTY_SIGNATURE } from "./Signature";
import type { ComponentCtor, Entity, EntityId, Signature } from "./Types";

export type SystemCtor<S extends System = System> = abstract new (...args: never[]) => S;

/** A system the step runner can drive. */
export interface UpdatableSystem
{
    update(coordinator: Coordinator, dt: number): void;
}

/**
 * Base class for behaviour units. Subclasses declare what they need with
 * {@link requireComponent} in their constructor; the coordinator turns those
 * classes into a signature when the system is registered and from then on
 * keeps {@link getSystemEntities} in sync with it.
 */
export abstract class System
{
    private readonly required: Function[] = [];
    private readonly entities: Entity[] = [];
    private readonly members = new Set<EntityId>();
    private signature: Signature = EMPTY_SIGNATURE;
    private locked = false;

    protected requireComponent<T>(ctor: ComponentCtor<T>): void
    {
        if (this.locked) throw EcsError.systemLocked(formatCtor(this.constructor), formatCtor(ctor));
        if (!this.required.includes(ctor)) this.required.push(ctor);
    }

    public getRequiredComponents(): readonly Function[]
    {
        return this.required;
    }

    public getSignature(): Signature
    {
        return this.signature;
    }

    /** Snapshot of the matched entities, in the order they joined. */
    public getSystemEntities(): Entity[]
    {
        return this.entities.slice();
    }

    public get entityCount(): number
    {
        return this.entities.length;
    }

    public hasEntity(e: Entity): boolean
    {
        return this.members.has(e.id);
    }

    /** @internal Called by the coordinator when the entity starts matching. */
    public addEntityToSystem(e: Entity): void
    {
        if (this.members.has(e.id)) return;
        this.members.add(e.id);
        this.entities.push(e);
    }

    /** @internal Called by the coordinator when the entity stops matching or is destroyed. */
    public removeEntityFromSystem(e: Entity): void
    {
        if (!this.members.delete(e.id)) return;
        const idx = this.entities.findIndex(other => sameEntity(other, e));
        if (idx >= 0) this.entities.splice(idx, 1);
    }

    /** @internal Freezes the requirement; later requireComponent calls throw. */
    public bindSignature(signature: Signature): void
    {
        this.signature = signature;
        this.locked = true;
    }
}

export function isUpdatable(system: System): system is System & UpdatableSystem
{
    return "update" in system && typeof system.update === "function";
}
