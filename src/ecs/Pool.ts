import type { EntityId, TypeId } from "./Types";

/**
 * Type-erased view of a pool. The coordinator keeps every pool behind this
 * interface so pools of different component types share one array.
 */
export interface IPool
{
    readonly typeId: TypeId;
    readonly ctor: Function;
    readonly size: number;
    isEmpty(): boolean;
    has(entityId: EntityId): boolean;
    remove(entityId: EntityId): void;
    clear(): void;
}

/**
 * Dense storage for one component type.
 *
 * Values are packed in `data[0..size)`. Two maps tie the stable entity id to
 * the movable dense slot: `entityIdToIndex[e]` is e's slot and
 * `indexToEntityId[entityIdToIndex[e]] === e` for every stored entity.
 * Removal swaps the last slot into the hole, so dense order is not stable.
 */
export class Pool<T> implements IPool
{
    private readonly data: T[] = [];
    private readonly entityIdToIndex = new Map<EntityId, number>();
    private readonly indexToEntityId = new Map<number, EntityId>();

    constructor(
        public readonly typeId: TypeId,
        public readonly ctor: Function
    ) {}

    public get size(): number
    {
        return this.data.length;
    }

    public isEmpty(): boolean
    {
        return this.data.length === 0;
    }

    public has(entityId: EntityId): boolean
    {
        return this.entityIdToIndex.has(entityId);
    }

    /** Inserts at the end, or overwrites in place when the entity already has a slot. */
    public set(entityId: EntityId, value: T): void
    {
        const existing = this.entityIdToIndex.get(entityId);
        if (existing !== undefined) {
            this.data[existing] = value;
            return;
        }

        const index = this.data.length;
        this.entityIdToIndex.set(entityId, index);
        this.indexToEntityId.set(index, entityId);
        this.data.push(value);
    }

    public remove(entityId: EntityId): void
    {
        const indexOfRemoved = this.entityIdToIndex.get(entityId);
        if (indexOfRemoved === undefined) return;

        const indexOfLast = this.data.length - 1;
        const entityIdOfLast = this.indexToEntityId.get(indexOfLast);

        if (indexOfRemoved !== indexOfLast && entityIdOfLast !== undefined) {
            this.data[indexOfRemoved] = this.data[indexOfLast];
            this.entityIdToIndex.set(entityIdOfLast, indexOfRemoved);
            this.indexToEntityId.set(indexOfRemoved, entityIdOfLast);
        }
        this.data.pop();

        this.entityIdToIndex.delete(entityId);
        this.indexToEntityId.delete(indexOfLast);
    }

    public get(entityId: EntityId): T | undefined
    {
        const index = this.entityIdToIndex.get(entityId);
        return index === undefined ? undefined : this.data[index];
    }

    /** Dense slot access; `index` is not an entity id. */
    public at(index: number): T | undefined
    {
        return this.data[index];
    }

    public entityAt(index: number): EntityId | undefined
    {
        return this.indexToEntityId.get(index);
    }

    public indexOf(entityId: EntityId): number | undefined
    {
        return this.entityIdToIndex.get(entityId);
    }

    public clear(): void
    {
        this.data.length = 0;
        this.entityIdToIndex.clear();
        this.indexToEntityId.clear();
    }

    public forEach(fn: (value: T, entityId: EntityId) => void): void
    {
        for (let i = 0; i < this.data.length; i++) {
            const id = this.indexToEntityId.get(i);
            if (id !== undefined) fn(this.data[i], id);
        }
    }

    public *[Symbol.iterator](): IterableIterator<[EntityId, T]>
    {
        for (let i = 0; i < this.data.length; i++) {
            const id = this.indexToEntityId.get(i);
            if (id !== undefined) yield [id, this.data[i]];
        }
    }
}

/** Checked downcast from the type-erased handle, guarded by the pool's component class. */
export function isPoolOf<T>(pool: IPool | undefined, ctor: Function): pool is Pool<T>
{
    return pool instanceof Pool && pool.ctor === ctor;
}
