import type { Entity, EntityId } from "./Types";

/**
 * Bijection tag <-> entity: a tag names at most one entity and an entity
 * carries at most one tag. Both maps are always updated together.
 */
export class TagIndex
{
    private readonly entityPerTag = new Map<string, Entity>();
    private readonly tagPerEntityId = new Map<EntityId, string>();

    public get size(): number
    {
        return this.entityPerTag.size;
    }

    /**
     * First assignment wins: a tag already held by any entity is left alone.
     * An entity that already carries another tag gives it up.
     */
    public tag(e: Entity, tag: string): boolean
    {
        if (this.entityPerTag.has(tag)) return false;

        this.removeEntity(e);
        this.entityPerTag.set(tag, e);
        this.tagPerEntityId.set(e.id, tag);
        return true;
    }

    public has(e: Entity, tag: string): boolean
    {
        return this.tagPerEntityId.get(e.id) === tag;
    }

    public get(tag: string): Entity | undefined
    {
        return this.entityPerTag.get(tag);
    }

    public tagOf(e: Entity): string | undefined
    {
        return this.tagPerEntityId.get(e.id);
    }

    public removeEntity(e: Entity): void
    {
        const tag = this.tagPerEntityId.get(e.id);
        if (tag === undefined) return;
        this.tagPerEntityId.delete(e.id);
        this.entityPerTag.delete(tag);
    }

    public removeTag(tag: string): void
    {
        const e = this.entityPerTag.get(tag);
        if (!e) return;
        this.entityPerTag.delete(tag);
        this.tagPerEntityId.delete(e.id);
    }
}
