import type { Entity, EntityId } from "./Types";

export function entity(id: EntityId): Entity
{
    return { id };
}

/** Entities are values: two handles are the same entity iff their ids match. */
export function sameEntity(a: Entity, b: Entity): boolean
{
    return a.id === b.id;
}

export function compareEntities(a: Entity, b: Entity): number
{
    return a.id - b.id;
}

export function sortEntities(list: Iterable<Entity>): Entity[]
{
    return Array.from(list).sort(compareEntities);
}
