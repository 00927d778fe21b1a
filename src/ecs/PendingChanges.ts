import { sortEntities } from "./Entity";
import type { Entity, EntityId } from "./Types";

export type StagedChanges = Readonly<{
    create: Entity[];
    refresh: Entity[];
    destroy: Entity[];
}>;

/**
 * Staging buffer for structural changes. Nothing here touches systems or
 * pools; the coordinator commits a drained batch during `update()`.
 */
export class PendingChanges
{
    private toCreate = new Map<EntityId, Entity>();
    private toRefresh = new Map<EntityId, Entity>();
    private toDestroy = new Map<EntityId, Entity>();

    public create(e: Entity): void
    {
        this.toCreate.set(e.id, e);
    }

    /** The entity's signature changed; re-match it against every system. */
    public refresh(e: Entity): void
    {
        this.toRefresh.set(e.id, e);
    }

    public destroy(e: Entity): void
    {
        this.toDestroy.set(e.id, e);
    }

    public isCreating(e: Entity): boolean
    {
        return this.toCreate.has(e.id);
    }

    public isDestroying(e: Entity): boolean
    {
        return this.toDestroy.has(e.id);
    }

    public get counts(): Readonly<{ create: number; refresh: number; destroy: number }>
    {
        return { create: this.toCreate.size, refresh: this.toRefresh.size, destroy: this.toDestroy.size };
    }

    public isEmpty(): boolean
    {
        return this.toCreate.size === 0 && this.toRefresh.size === 0 && this.toDestroy.size === 0;
    }

    /** Returns every staged entity in ascending id order and clears the buffer. */
    public drain(): StagedChanges
    {
        const out: StagedChanges = {
            create: sortEntities(this.toCreate.values()),
            refresh: sortEntities(this.toRefresh.values()),
            destroy: sortEntities(this.toDestroy.values())
        };
        this.toCreate = new Map();
        this.toRefresh = new Map();
        this.toDestroy = new Map();
        return out;
    }
}
