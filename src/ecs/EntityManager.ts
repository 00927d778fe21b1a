import { EMPTY_SIGNATURE } from "./Signature";
import type { Entity, EntityId, Signature } from "./Types";

const INITIAL_SIGNATURE_CAPACITY = 2;

/**
 * Id allocation plus the per-entity signature table (indexed by EntityId).
 */
export class EntityManager
{
    private _nextId: EntityId = 0;
    // insertion-ordered: the oldest released id is reused first
    private readonly _free = new Set<EntityId>();
    private _signatures = new Uint32Array(0);

    public create(): Entity
    {
        for (const id of this._free) {
            this._free.delete(id);
            return { id };
        }

        const id = this._nextId++;
        if (id >= this._signatures.length) this._grow(id);
        return { id };
    }

    /** Clears the entity's signature and queues its id for reuse. */
    public release(id: EntityId): void
    {
        if (!this.isAllocated(id)) return;
        this._signatures[id] = EMPTY_SIGNATURE;
        this._free.add(id);
    }

    public isAllocated(id: EntityId): boolean
    {
        return Number.isInteger(id) && id >= 0 && id < this._nextId && !this._free.has(id);
    }

    public signatureOf(id: EntityId): Signature
    {
        return this._signatures[id] ?? EMPTY_SIGNATURE;
    }

    public setSignature(id: EntityId, sig: Signature): void
    {
        this._signatures[id] = sig;
    }

    public get allocatedCount(): number
    {
        return this._nextId - this._free.size;
    }

    public get freeCount(): number
    {
        return this._free.size;
    }

    public get signatureCapacity(): number
    {
        return this._signatures.length;
    }

    private _grow(id: EntityId): void
    {
        let capacity = this._signatures.length === 0 ? INITIAL_SIGNATURE_CAPACITY : this._signatures.length;
        while (id >= capacity) capacity *= 2;

        const next = new Uint32Array(capacity);
        next.set(this._signatures);
        this._signatures = next;
    }
}
