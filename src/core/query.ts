/**
 * Query
 *
 * A lazy, finite iterable over the entities that carry every required
 * component. Nothing is resolved until iteration starts; each iteration takes
 * the archetype table's cached result for the mask at that moment, so
 * mutations made while iterating never disturb the running loop.
 */

import { ComponentType, maskOf } from './component';
import type { EntityId } from './entity-id';

export interface QuerySource {
    resolve(requiredMask: number): readonly EntityId[];
    isAlive(id: EntityId): boolean;
}

export class Query implements Iterable<EntityId> {
    readonly requiredMask: number;

    constructor(
        private readonly source: QuerySource,
        readonly required: readonly ComponentType[]
    ) {
        this.requiredMask = maskOf(required);
    }

    [Symbol.iterator](): Iterator<EntityId> {
        const ids = this.source.resolve(this.requiredMask);
        const source = this.source;
        let index = 0;
        return {
            next(): IteratorResult<EntityId> {
                while (index < ids.length) {
                    const id = ids[index++];
                    // Skip entities destroyed (outside a tick) after resolution
                    if (source.isAlive(id)) {
                        return { done: false, value: id };
                    }
                }
                return { done: true, value: undefined };
            }
        };
    }

    /**
     * Convert to array (allocates).
     */
    toArray(): EntityId[] {
        return Array.from(this);
    }

    first(): EntityId | undefined {
        for (const id of this) {
            return id;
        }
        return undefined;
    }

    /**
     * Count entities without allocating an array.
     */
    count(): number {
        let count = 0;
        for (const _ of this) {
            count++;
        }
        return count;
    }
}
