import { EcsError, formatCtor } from "./Errors";
import { MAX_COMPONENTS } from "./Signature";
import type { TypeId } from "./Types";

/**
 * Assigns each component class a stable small integer on first use.
 * One registry per coordinator, so ids never leak between coordinators.
 */
export class TypeRegistry
{
    private readonly ctorToId = new Map<Function, TypeId>();
    private nextId: TypeId = 0;

    constructor(public readonly capacity: number = MAX_COMPONENTS) {}

    public get size(): number
    {
        return this.nextId;
    }

    /**
     * Returns the TypeId for `ctor`, registering it if needed.
     * Throws CAPACITY_EXCEEDED once every slot is taken.
     */
    public typeId(ctor: Function): TypeId
    {
        const existing = this.ctorToId.get(ctor);
        if (existing != null) return existing;
        if (this.nextId >= this.capacity) throw EcsError.capacityExceeded(formatCtor(ctor), this.capacity);

        const id = this.nextId++;
        this.ctorToId.set(ctor, id);
        return id;
    }

    /**
     * Registers every class in `ctors`, or none of them when they would not all
     * fit. Duplicates and already registered classes take no extra slot.
     */
    public typeIds(ctors: readonly Function[]): TypeId[]
    {
        const missing = new Set(ctors.filter(ctor => !this.ctorToId.has(ctor)));
        if (this.nextId + missing.size > this.capacity) {
            const overflow = Array.from(missing)[this.capacity - this.nextId];
            throw EcsError.capacityExceeded(formatCtor(overflow), this.capacity);
        }
        return ctors.map(ctor => this.typeId(ctor));
    }

    /** Looks up without registering. */
    public peek(ctor: Function): TypeId | undefined
    {
        return this.ctorToId.get(ctor);
    }
}
