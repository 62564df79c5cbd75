/**
 * Archetype Table
 *
 * Groups live entities by the exact set of components they carry. Query
 * results are assembled from every archetype whose mask is a superset of the
 * required mask and cached per required mask; a structural change to
 * archetype A only evicts the cached queries whose mask is a subset of A.
 */

import type { EntityId } from './entity-id';

function insertSorted(list: EntityId[], id: EntityId): void {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (list[mid] < id) lo = mid + 1;
        else hi = mid;
    }
    list.splice(lo, 0, id);
}

function removeSorted(list: EntityId[], id: EntityId): boolean {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (list[mid] < id) lo = mid + 1;
        else hi = mid;
    }
    if (lo < list.length && list[lo] === id) {
        list.splice(lo, 1);
        return true;
    }
    return false;
}

export class ArchetypeTable {
    /** mask -> member ids, ascending */
    private archetypes = new Map<number, EntityId[]>();

    /** Masks of non-empty archetypes, ascending */
    private masks: number[] = [];

    /** required mask -> resolved ids; arrays are replaced, never mutated */
    private cache = new Map<number, readonly EntityId[]>();

    private cacheHits = 0;
    private cacheMisses = 0;

    add(mask: number, id: EntityId): void {
        let members = this.archetypes.get(mask);
        if (!members) {
            members = [];
            this.archetypes.set(mask, members);
            insertSorted(this.masks, mask);
        }
        insertSorted(members, id);
        this.invalidate(mask);
    }

    remove(mask: number, id: EntityId): void {
        const members = this.archetypes.get(mask);
        if (!members || !removeSorted(members, id)) return;

        if (members.length === 0) {
            this.archetypes.delete(mask);
            removeSorted(this.masks, mask);
        }
        this.invalidate(mask);
    }

    move(id: EntityId, from: number, to: number): void {
        if (from === to) return;
        this.remove(from, id);
        this.add(to, id);
    }

    /**
     * Ids of every entity carrying at least the required components, grouped
     * by ascending archetype mask, ascending id within a group.
     */
    resolve(required: number): readonly EntityId[] {
        const cached = this.cache.get(required);
        if (cached) {
            this.cacheHits++;
            return cached;
        }

        this.cacheMisses++;
        const result: EntityId[] = [];
        for (const mask of this.masks) {
            if ((mask & required) !== required) continue;
            const members = this.archetypes.get(mask);
            if (members) result.push(...members);
        }
        this.cache.set(required, result);
        return result;
    }

    isCached(required: number): boolean {
        return this.cache.has(required);
    }

    getStats(): { archetypes: number; cachedQueries: number; hits: number; misses: number } {
        return {
            archetypes: this.masks.length,
            cachedQueries: this.cache.size,
            hits: this.cacheHits,
            misses: this.cacheMisses
        };
    }

    clear(): void {
        this.archetypes.clear();
        this.masks = [];
        this.cache.clear();
    }

    private invalidate(changedMask: number): void {
        for (const required of this.cache.keys()) {
            if ((changedMask & required) === required) {
                this.cache.delete(required);
            }
        }
    }
}
