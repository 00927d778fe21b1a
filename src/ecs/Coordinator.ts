import { EntityManager } from "./EntityManager";
import { EcsError, formatCtor } from "./Errors";
import { GroupIndex } from "./GroupIndex";
import { PendingChanges } from "./PendingChanges";
import { isPoolOf, Pool } from "./Pool";
import type { IPool } from "./Pool";
import { EMPTY_SIGNATURE, MAX_COMPONENTS, signatureHas, signatureHasAll, signatureWith, signatureWithout } from "./Signature";
import type { System, SystemCtor } from "./System";
import { TagIndex } from "./TagIndex";
import { TypeRegistry } from "./TypeRegistry";
import type {
    ComponentCtor,
    CoordinatorOptions,
    CoordinatorStats,
    Entity,
    EntityId,
    Logger,
    Signature
} from "./Types";

type ResolvedOptions = Readonly<{
    maxComponents: number;
    logger: Logger;
    debug: boolean;
}>;

function resolveOptions(options: CoordinatorOptions): ResolvedOptions
{
    const maxComponents = options.maxComponents ?? MAX_COMPONENTS;
    if (!Number.isInteger(maxComponents) || maxComponents < 1 || maxComponents > MAX_COMPONENTS) {
        throw EcsError.configInvalid(`maxComponents must be an integer in [1, ${MAX_COMPONENTS}], got ${maxComponents}`, { maxComponents });
    }

    return {
        maxComponents,
        logger: options.logger ?? console,
        debug: options.debug ?? false
    };
}

/**
 * Owns entities, component pools, systems and the tag/group indexes.
 *
 * Component attachment is applied immediately. Entity creation and
 * destruction are staged and only committed by {@link update}, which must run
 * once per step before any system iterates its entities.
 */
export class Coordinator
{
    private readonly opts: ResolvedOptions;

    private readonly entities = new EntityManager();
    private readonly alive = new Map<EntityId, Entity>();
    private readonly pending = new PendingChanges();

    private readonly types: TypeRegistry;
    // [ index = component type id ]
    private readonly pools: (IPool | undefined)[] = [];

    private readonly systemsByCtor = new Map<Function, System>();

    private readonly tags = new TagIndex();
    private readonly groups = new GroupIndex();

    constructor(options: CoordinatorOptions = {})
    {
        this.opts = resolveOptions(options);
        this.types = new TypeRegistry(this.opts.maxComponents);
    }

    //#region ---------- Entity lifecycle ----------
    /** Allocates an entity. Systems see it after the next {@link update}. */
    public create(): Entity
    {
        const e = this.entities.create();
        this.pending.create(e);
        this._debug(`entity ${e.id} created`);
        return e;
    }

    /** Stages destruction; pools, signature and systems are untouched until {@link update}. */
    public destroy(e: Entity): void
    {
        this._assertAllocated(e, "destroy");
        this.pending.destroy(e);
        this._debug(`entity ${e.id} staged for destruction`);
    }

    /** True once the entity's creation has been committed and until its destruction is. */
    public isAlive(e: Entity): boolean
    {
        return this.alive.has(e.id);
    }

    public isPending(e: Entity): boolean
    {
        return this.pending.isCreating(e) || this.pending.isDestroying(e);
    }

    public getSignature(e: Entity): Signature
    {
        return this.entities.signatureOf(e.id);
    }
    //#endregion

    //#region ---------- Components ----------
    /** Constructs `ctor` from `args` and attaches it, replacing any existing value in place. */
    public addComponent<T, A extends unknown[]>(e: Entity, ctor: new (...args: A) => T, ...args: A): T
    {
        return this._store(e, ctor, new ctor(...args));
    }

    /** Attaches an already built component value. */
    public setComponent<T>(e: Entity, ctor: ComponentCtor<T>, value: T): T
    {
        return this._store(e, ctor, value);
    }

    public removeComponent(e: Entity, ctor: ComponentCtor): void
    {
        const tid = this.types.peek(ctor);
        if (tid === undefined) return;
        const pool = this.pools[tid];
        if (!pool || !pool.has(e.id)) return;

        pool.remove(e.id);
        this.entities.setSignature(e.id, signatureWithout(this.entities.signatureOf(e.id), tid));
        if (this.alive.has(e.id)) this.pending.refresh(e);
    }

    public hasComponent(e: Entity, ctor: ComponentCtor): boolean
    {
        const tid = this.types.peek(ctor);
        if (tid === undefined) return false;
        return signatureHas(this.entities.signatureOf(e.id), tid);
    }

    /**
     * Returns the stored value itself; mutations are visible to every reader.
     * Throws COMPONENT_NOT_FOUND when the entity lacks the component.
     */
    public getComponent<T>(e: Entity, ctor: ComponentCtor<T>): T
    {
        const value = this.findComponent(e, ctor);
        if (value === undefined) throw EcsError.componentNotFound(e.id, formatCtor(ctor));
        return value;
    }

    public findComponent<T>(e: Entity, ctor: ComponentCtor<T>): T | undefined
    {
        if (!this.hasComponent(e, ctor)) return undefined;
        return this.getPool(ctor)?.get(e.id);
    }

    public getPool<T>(ctor: ComponentCtor<T>): Pool<T> | undefined
    {
        const tid = this.types.peek(ctor);
        if (tid === undefined) return undefined;
        const pool = this.pools[tid];
        return isPoolOf<T>(pool, ctor) ? pool : undefined;
    }
    //#endregion

    //#region ---------- Systems ----------
    /**
     * Constructs and registers a system, replacing any instance of the same
     * class. The new instance is matched against every live entity right away,
     * so replacing a system does not lose entities created before it.
     */
    public addSystem<S extends System, A extends unknown[]>(ctor: new (...args: A) => S, ...args: A): S
    {
        const system = new ctor(...args);

        let sig: Signature = EMPTY_SIGNATURE;
        for (const tid of this.types.typeIds(system.getRequiredComponents())) {
            sig = signatureWith(sig, tid);
        }
        system.bindSignature(sig);

        if (this.systemsByCtor.has(ctor)) {
            this.opts.logger.warn(`System ${formatCtor(ctor)} was already registered; the previous instance and its entity list are discarded.`);
        }
        this.systemsByCtor.set(ctor, system);

        for (const e of this.alive.values()) {
            if (signatureHasAll(this.entities.signatureOf(e.id), sig)) system.addEntityToSystem(e);
        }
        return system;
    }

    public removeSystem<S extends System>(ctor: SystemCtor<S>): boolean
    {
        return this.systemsByCtor.delete(ctor);
    }

    public hasSystem<S extends System>(ctor: SystemCtor<S>): boolean
    {
        return this.systemsByCtor.has(ctor);
    }

    /** Throws SYSTEM_NOT_FOUND when `ctor` is not registered. */
    public getSystem<S extends System>(ctor: SystemCtor<S>): S
    {
        const system = this.systemsByCtor.get(ctor);
        if (system instanceof ctor) return system;
        throw EcsError.systemNotFound(formatCtor(ctor));
    }

    public systems(): System[]
    {
        return Array.from(this.systemsByCtor.values());
    }
    //#endregion

    //#region ---------- Reconciliation ----------
    /**
     * Commits staged changes, in order:
     * 1. created entities join every system whose signature they satisfy;
     * 2. live entities whose components changed are re-matched;
     * 3. destroyed entities leave every system and pool, lose their tag and
     *    groups, and their ids become reusable.
     */
    public update(): void
    {
        if (this.pending.isEmpty()) return;
        const { create, refresh, destroy } = this.pending.drain();

        for (const e of create) {
            this.alive.set(e.id, e);
            this._addEntityToSystems(e);
        }

        const destroying = new Set(destroy.map(e => e.id));
        for (const e of refresh) {
            if (destroying.has(e.id) || !this.alive.has(e.id)) continue;
            this._refreshEntity(e);
        }

        for (const e of destroy) {
            this._removeEntityFromSystems(e);
            for (const pool of this.pools) pool?.remove(e.id);
            this.tags.removeEntity(e);
            this.groups.removeEntity(e);
            this.alive.delete(e.id);
            this.entities.release(e.id);
        }

        this._debug(`update: ${create.length} created, ${refresh.length} refreshed, ${destroy.length} destroyed`);
    }
    //#endregion

    //#region ---------- Tags ----------
    /** No-op (returns false) when the tag already belongs to an entity. */
    public tagEntity(e: Entity, tag: string): boolean
    {
        this._assertAllocated(e, "tagEntity");
        return this.tags.tag(e, tag);
    }

    public entityHasTag(e: Entity, tag: string): boolean
    {
        return this.tags.has(e, tag);
    }

    public getEntityByTag(tag: string): Entity | undefined
    {
        return this.tags.get(tag);
    }

    /** Throws TAG_NOT_FOUND when no entity carries `tag`. */
    public requireEntityByTag(tag: string): Entity
    {
        const e = this.tags.get(tag);
        if (!e) throw EcsError.tagNotFound(tag);
        return e;
    }

    public getEntityTag(e: Entity): string | undefined
    {
        return this.tags.tagOf(e);
    }

    public removeEntityTag(e: Entity): void
    {
        this.tags.removeEntity(e);
    }

    public removeTag(tag: string): void
    {
        this.tags.removeTag(tag);
    }
    //#endregion

    //#region ---------- Groups ----------
    public groupEntity(e: Entity, group: string): void
    {
        this._assertAllocated(e, "groupEntity");
        this.groups.add(e, group);
    }

    public entityBelongsToGroup(e: Entity, group: string): boolean
    {
        return this.groups.belongs(e, group);
    }

    public getEntitiesByGroup(group: string): Entity[]
    {
        return this.groups.entities(group);
    }

    public getEntityGroups(e: Entity): string[]
    {
        return this.groups.groupsOf(e);
    }

    public removeEntityGroup(e: Entity, group: string): void
    {
        this.groups.remove(e, group);
    }

    public removeEntityGroups(e: Entity): void
    {
        this.groups.removeEntity(e);
    }

    public removeGroup(group: string): void
    {
        this.groups.removeGroup(group);
    }
    //#endregion

    public stats(): CoordinatorStats
    {
        const counts = this.pending.counts;
        return {
            liveEntities: this.alive.size,
            pendingCreate: counts.create,
            pendingRefresh: counts.refresh,
            pendingDestroy: counts.destroy,
            freeIds: this.entities.freeCount,
            componentTypes: this.types.size,
            pools: this.pools.filter(p => p !== undefined).length,
            systems: this.systemsByCtor.size,
            tags: this.tags.size,
            groups: this.groups.size
        };
    }

    //#region ---------- Internals ----------
    private _assertAllocated(e: Entity, op: string): void
    {
        if (!this.entities.isAllocated(e.id)) throw EcsError.entityNotFound(e.id, op);
    }

    private _store<T>(e: Entity, ctor: Function, value: T): T
    {
        this._assertAllocated(e, "addComponent");
        const tid = this.types.typeId(ctor);
        this._poolFor<T>(tid, ctor).set(e.id, value);

        const before = this.entities.signatureOf(e.id);
        const after = signatureWith(before, tid);
        if (after !== before) {
            this.entities.setSignature(e.id, after);
            if (this.alive.has(e.id)) this.pending.refresh(e);
        }
        return value;
    }

    private _poolFor<T>(tid: number, ctor: Function): Pool<T>
    {
        while (this.pools.length <= tid) this.pools.push(undefined);

        const existing = this.pools[tid];
        if (isPoolOf<T>(existing, ctor)) return existing;

        const pool = new Pool<T>(tid, ctor);
        this.pools[tid] = pool;
        this._debug(`pool created for ${formatCtor(ctor)} (type ${tid})`);
        return pool;
    }

    private _addEntityToSystems(e: Entity): void
    {
        const sig = this.entities.signatureOf(e.id);
        for (const system of this.systemsByCtor.values()) {
            if (signatureHasAll(sig, system.getSignature())) system.addEntityToSystem(e);
        }
    }

    private _refreshEntity(e: Entity): void
    {
        const sig = this.entities.signatureOf(e.id);
        for (const system of this.systemsByCtor.values()) {
            if (signatureHasAll(sig, system.getSignature())) system.addEntityToSystem(e);
            else system.removeEntityFromSystem(e);
        }
    }

    private _removeEntityFromSystems(e: Entity): void
    {
        for (const system of this.systemsByCtor.values()) system.removeEntityFromSystem(e);
    }

    private _debug(message: string): void
    {
        if (this.opts.debug) this.opts.logger.debug(`[ecs] ${message}`);
    }
    //#endregion
}
