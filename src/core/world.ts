/**
 * ECS World
 *
 * Owns every entity and component of one simulation side. Manages:
 * - Entity id allocation with generation checks
 * - Component storage, one slot array per component type
 * - Archetype grouping and cached queries
 * - Deferred structural mutation while systems iterate
 *
 * A server world and any number of client worlds may coexist in a process;
 * nothing here is global.
 */

import {
    ComponentType,
    ComponentData,
    ComponentRecordSet,
    COMPONENT_TYPES,
    componentBit,
    cloneComponent,
    getRecord,
    setRecord,
    typesOfMask
} from './component';
import { MAX_ENTITIES } from './constants';
import { EntityId, EntityIdAllocator, entityIndex } from './entity-id';
import { ArchetypeTable } from './archetype';
import { CommandBuffer } from './command-buffer';
import { Query } from './query';
import { InvalidEntityError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('ecs');

export type StoreResult = { ok: true } | { ok: false; error: InvalidEntityError };

const OK: StoreResult = { ok: true };

/**
 * Detached copy of one entity's components.
 */
export interface EntityRecord {
    archetype: number;
    components: ComponentRecordSet;
}

type ComponentStores = { [K in ComponentType]: (ComponentData[K] | undefined)[] };

export class World {
    private readonly allocator: EntityIdAllocator;

    /** Committed archetype mask per entity index */
    private readonly masks: Uint32Array;

    /** 1 once the entity has joined the archetype table */
    private readonly joined: Uint8Array;

    private readonly stores: ComponentStores = {
        [ComponentType.Transform]: [],
        [ComponentType.Hitbox]: [],
        [ComponentType.Character]: [],
        [ComponentType.Controller]: []
    };

    private readonly archetypes = new ArchetypeTable();
    private readonly commands = new CommandBuffer();
    private iterationDepth = 0;

    constructor(capacity: number = MAX_ENTITIES) {
        this.allocator = new EntityIdAllocator(capacity);
        this.masks = new Uint32Array(capacity);
        this.joined = new Uint8Array(capacity);
    }

    // ==========================================
    // Iteration / deferral
    // ==========================================

    /**
     * True while a system runs. Structural mutations are queued until flush.
     */
    get isIterating(): boolean {
        return this.iterationDepth > 0;
    }

    /**
     * Run `fn` with structural mutations deferred. Nested calls are allowed.
     */
    deferred<T>(fn: () => T): T {
        this.iterationDepth++;
        try {
            return fn();
        } finally {
            this.iterationDepth--;
        }
    }

    /** Number of queued structural commands. */
    get pendingCommands(): number {
        return this.commands.length;
    }

    /**
     * Apply queued mutations in issue order. Commands against ids that went
     * stale before the flush are dropped.
     */
    flush(): void {
        if (this.isIterating) {
            throw new Error('World.flush() called while systems are iterating');
        }

        // Commands issued by a flushed command apply immediately, so one drain suffices
        for (const command of this.commands.drain()) {
            if (!this.allocator.isValid(command.id)) continue;

            switch (command.kind) {
                case 'spawn':
                    this.join(command.id);
                    break;
                case 'destroy':
                    this.applyDestroy(command.id);
                    break;
                case 'add':
                    command.apply(this);
                    break;
                case 'remove':
                    this.applyRemove(command.id, command.type);
                    break;
            }
        }
    }

    // ==========================================
    // Entities
    // ==========================================

    /**
     * Create an entity with no components. The id is valid at once; during
     * iteration the entity joins query results only after the next flush.
     */
    createEntity(): EntityId {
        const id = this.allocator.allocate();
        this.admit(id);
        return id;
    }

    /**
     * Create an entity with an id chosen elsewhere (a client mirroring the
     * server). Returns false if the slot is occupied by a live entity.
     */
    createEntityWithId(id: EntityId): boolean {
        if (!this.allocator.allocateSpecific(id)) return false;
        this.admit(id);
        return true;
    }

    /**
     * Destroy an entity. Stale ids are ignored.
     */
    destroyEntity(id: EntityId): void {
        if (!this.allocator.isValid(id)) return;

        if (this.isIterating) {
            this.commands.destroy(id);
            return;
        }
        this.applyDestroy(id);
    }

    isAlive(id: EntityId): boolean {
        return this.allocator.isValid(id);
    }

    get entityCount(): number {
        return this.allocator.getActiveCount();
    }

    /**
     * All live entity ids in ascending order.
     */
    entities(): EntityId[] {
        const ids: EntityId[] = [];
        const highWater = this.allocator.getHighWater();
        for (let index = 0; index < highWater; index++) {
            const id = this.allocator.currentId(index);
            if (this.allocator.isValid(id)) ids.push(id);
        }
        return ids.sort((a, b) => a - b);
    }

    // ==========================================
    // Components
    // ==========================================

    /**
     * Attach a component, replacing existing data of the same type. The
     * world takes ownership of `data`.
     */
    addComponent<K extends ComponentType>(id: EntityId, type: K, data: ComponentData[K]): StoreResult {
        if (!this.allocator.isValid(id)) return this.invalid(id);

        if (this.isIterating) {
            this.commands.add(id, type, data);
            return OK;
        }

        const index = entityIndex(id);
        const store: (ComponentData[K] | undefined)[] = this.stores[type];
        store[index] = data;

        const from = this.masks[index];
        const to = from | componentBit(type);
        if (from !== to) {
            this.masks[index] = to;
            if (this.joined[index] === 1) {
                this.archetypes.move(id, from, to);
            }
        }
        return OK;
    }

    removeComponent(id: EntityId, type: ComponentType): StoreResult {
        if (!this.allocator.isValid(id)) return this.invalid(id);

        if (this.isIterating) {
            this.commands.remove(id, type);
            return OK;
        }
        this.applyRemove(id, type);
        return OK;
    }

    /**
     * Borrow a component record. Do not retain it across ticks.
     */
    getComponent<K extends ComponentType>(id: EntityId, type: K): ComponentData[K] | undefined {
        if (!this.allocator.isValid(id)) return undefined;
        const store: (ComponentData[K] | undefined)[] = this.stores[type];
        return store[entityIndex(id)];
    }

    hasComponent(id: EntityId, type: ComponentType): boolean {
        if (!this.allocator.isValid(id)) return false;
        return (this.masks[entityIndex(id)] & componentBit(type)) !== 0;
    }

    /**
     * Committed archetype mask, or undefined for a stale id.
     */
    archetypeOf(id: EntityId): number | undefined {
        if (!this.allocator.isValid(id)) return undefined;
        return this.masks[entityIndex(id)];
    }

    componentTypesOf(id: EntityId): ComponentType[] {
        const mask = this.archetypeOf(id);
        return mask === undefined ? [] : typesOfMask(mask);
    }

    // ==========================================
    // Queries
    // ==========================================

    query(required: readonly ComponentType[]): Query {
        return new Query(this, required);
    }

    /** @internal used by Query */
    resolve(requiredMask: number): readonly EntityId[] {
        return this.archetypes.resolve(requiredMask);
    }

    getArchetypeStats(): ReturnType<ArchetypeTable['getStats']> {
        return this.archetypes.getStats();
    }

    isQueryCached(required: readonly ComponentType[]): boolean {
        let mask = 0;
        for (const type of required) mask |= componentBit(type);
        return this.archetypes.isCached(mask);
    }

    // ==========================================
    // Records
    // ==========================================

    /**
     * Deep copy of an entity's components.
     */
    snapshotEntity(id: EntityId): EntityRecord | undefined {
        const archetype = this.archetypeOf(id);
        if (archetype === undefined) return undefined;

        const components: ComponentRecordSet = {};
        for (const type of typesOfMask(archetype)) {
            this.copyOut(id, type, components);
        }
        return { archetype, components };
    }

    /**
     * Make an entity carry exactly the components in `record` (cloned).
     */
    restoreEntity(id: EntityId, record: EntityRecord): StoreResult {
        if (!this.allocator.isValid(id)) return this.invalid(id);

        for (const type of COMPONENT_TYPES) {
            if ((record.archetype & componentBit(type)) === 0) {
                if (this.hasComponent(id, type)) this.removeComponent(id, type);
                continue;
            }
            this.copyIn(id, type, record.components);
        }
        return OK;
    }

    /**
     * Destroy everything and reset id allocation.
     */
    clear(): void {
        for (const type of COMPONENT_TYPES) {
            this.stores[type].length = 0;
        }
        this.masks.fill(0);
        this.joined.fill(0);
        this.archetypes.clear();
        this.commands.clear();
        this.allocator.reset();
    }

    // ==========================================
    // Internals
    // ==========================================

    private admit(id: EntityId): void {
        const index = entityIndex(id);
        this.masks[index] = 0;
        this.joined[index] = 0;

        if (this.isIterating) {
            this.commands.spawn(id);
        } else {
            this.join(id);
        }
    }

    private join(id: EntityId): void {
        const index = entityIndex(id);
        if (this.joined[index] === 1) return;
        this.joined[index] = 1;
        this.archetypes.add(this.masks[index], id);
    }

    private applyDestroy(id: EntityId): void {
        const index = entityIndex(id);
        if (this.joined[index] === 1) {
            this.archetypes.remove(this.masks[index], id);
        }
        for (const type of COMPONENT_TYPES) {
            this.stores[type][index] = undefined;
        }
        this.masks[index] = 0;
        this.joined[index] = 0;
        this.allocator.free(id);
    }

    private applyRemove(id: EntityId, type: ComponentType): void {
        const index = entityIndex(id);
        this.stores[type][index] = undefined;

        const from = this.masks[index];
        const to = from & ~componentBit(type);
        if (from === to) return;

        this.masks[index] = to;
        if (this.joined[index] === 1) {
            this.archetypes.move(id, from, to);
        }
    }

    private copyOut<K extends ComponentType>(id: EntityId, type: K, into: ComponentRecordSet): void {
        const data = this.getComponent(id, type);
        if (data !== undefined) {
            setRecord(into, type, cloneComponent(type, data));
        }
    }

    private copyIn<K extends ComponentType>(id: EntityId, type: K, from: ComponentRecordSet): void {
        const data = getRecord(from, type);
        if (data !== undefined) {
            this.addComponent(id, type, cloneComponent(type, data));
        }
    }

    private invalid(id: EntityId): StoreResult {
        const error = new InvalidEntityError(id);
        log.debug(error.message);
        return { ok: false, error };
    }
}
