import { sortEntities } from "./Entity";
import type { Entity, EntityId } from "./Types";

/**
 * Many-to-many group membership. Empty sets are dropped on either side, so a
 * group with no members is indistinguishable from one that never existed.
 */
export class GroupIndex
{
    private readonly entitiesPerGroup = new Map<string, Map<EntityId, Entity>>();
    private readonly groupsPerEntityId = new Map<EntityId, Set<string>>();

    public get size(): number
    {
        return this.entitiesPerGroup.size;
    }

    public add(e: Entity, group: string): void
    {
        let members = this.entitiesPerGroup.get(group);
        if (!members) {
            members = new Map();
            this.entitiesPerGroup.set(group, members);
        }
        members.set(e.id, e);

        let groups = this.groupsPerEntityId.get(e.id);
        if (!groups) {
            groups = new Set();
            this.groupsPerEntityId.set(e.id, groups);
        }
        groups.add(group);
    }

    public belongs(e: Entity, group: string): boolean
    {
        return this.entitiesPerGroup.get(group)?.has(e.id) ?? false;
    }

    /** Members ordered by id; empty when the group does not exist. */
    public entities(group: string): Entity[]
    {
        const members = this.entitiesPerGroup.get(group);
        return members ? sortEntities(members.values()) : [];
    }

    public groupsOf(e: Entity): string[]
    {
        const groups = this.groupsPerEntityId.get(e.id);
        return groups ? Array.from(groups) : [];
    }

    public remove(e: Entity, group: string): void
    {
        const members = this.entitiesPerGroup.get(group);
        if (members) {
            members.delete(e.id);
            if (members.size === 0) this.entitiesPerGroup.delete(group);
        }

        const groups = this.groupsPerEntityId.get(e.id);
        if (groups) {
            groups.delete(group);
            if (groups.size === 0) this.groupsPerEntityId.delete(e.id);
        }
    }

    public removeEntity(e: Entity): void
    {
        const groups = this.groupsPerEntityId.get(e.id);
        if (!groups) return;
        for (const group of Array.from(groups)) this.remove(e, group);
    }

    public removeGroup(group: string): void
    {
        const members = this.entitiesPerGroup.get(group);
        if (!members) return;
        for (const e of Array.from(members.values())) this.remove(e, group);
    }
}
