/**
 * Entity ID Allocator
 *
 * Manages entity ID allocation with generation counters so that an id held
 * past its entity's destruction is detected as stale.
 * Entity ID format: [12 bits generation][20 bits index]
 */

import {
    MAX_ENTITIES,
    INDEX_MASK,
    INDEX_BITS,
    MAX_GENERATION
} from './constants';

/** Opaque handle; compare with `===`, never do arithmetic on it. */
export type EntityId = number;

export function entityIndex(id: EntityId): number {
    return id & INDEX_MASK;
}

export function entityGeneration(id: EntityId): number {
    return id >>> INDEX_BITS;
}

export function makeEntityId(index: number, generation: number): EntityId {
    return ((generation << INDEX_BITS) | index) >>> 0;
}

export class EntityIdAllocator {
    /** Generation counter for each entity slot */
    private generations: Uint16Array;

    /** Whether the slot currently holds a live entity */
    private live: Uint8Array;

    /** Free list of available indices (sorted ascending) */
    private freeList: number[] = [];

    /** Next index to allocate if free list is empty */
    private nextIndex: number = 0;

    private activeCount: number = 0;

    constructor(private readonly capacity: number = MAX_ENTITIES) {
        this.generations = new Uint16Array(capacity);
        this.live = new Uint8Array(capacity);
    }

    /**
     * Allocate a new entity ID, reusing the lowest freed index first.
     */
    allocate(): EntityId {
        let index = this.freeList.shift();

        if (index === undefined) {
            if (this.nextIndex >= this.capacity) {
                throw new Error(`Entity limit exceeded (capacity=${this.capacity})`);
            }
            index = this.nextIndex++;
        }

        this.live[index] = 1;
        this.activeCount++;
        return makeEntityId(index, this.generations[index]);
    }

    /**
     * Free an entity ID, returning its index to the pool.
     * Increments the slot generation so existing copies of the id go stale.
     * Returns false when the id was already stale.
     */
    free(id: EntityId): boolean {
        if (!this.isValid(id)) return false;
        const index = entityIndex(id);

        this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;
        this.live[index] = 0;
        this.activeCount--;

        this.freeList.splice(this.findInsertIndex(index), 0, index);
        return true;
    }

    /**
     * Check if an entity ID is still valid (slot live, generation matches).
     */
    isValid(id: EntityId): boolean {
        const index = entityIndex(id);
        return index < this.nextIndex
            && this.live[index] === 1
            && this.generations[index] === entityGeneration(id);
    }

    /**
     * Allocate a specific entity ID. Used by clients mirroring ids chosen by
     * the server. Fails when the slot already holds a live entity.
     */
    allocateSpecific(id: EntityId): boolean {
        const index = entityIndex(id);
        if (index >= this.capacity) return false;
        if (index < this.nextIndex && this.live[index] === 1) return false;

        // Indices skipped over become free
        while (this.nextIndex <= index) {
            const skipped = this.nextIndex++;
            if (skipped !== index) {
                this.freeList.splice(this.findInsertIndex(skipped), 0, skipped);
            }
        }

        const freeIdx = this.freeList.indexOf(index);
        if (freeIdx !== -1) {
            this.freeList.splice(freeIdx, 1);
        }

        this.generations[index] = entityGeneration(id);
        this.live[index] = 1;
        this.activeCount++;
        return true;
    }

    /**
     * The id the slot at `index` carries in its current generation.
     */
    currentId(index: number): EntityId {
        return makeEntityId(index, this.generations[index]);
    }

    getActiveCount(): number {
        return this.activeCount;
    }

    /** Upper bound (exclusive) of indices ever handed out. */
    getHighWater(): number {
        return this.nextIndex;
    }

    reset(): void {
        this.nextIndex = 0;
        this.freeList = [];
        this.activeCount = 0;
        this.generations.fill(0);
        this.live.fill(0);
    }

    private findInsertIndex(index: number): number {
        let lo = 0;
        let hi = this.freeList.length;

        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.freeList[mid] < index) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }

        return lo;
    }
}
