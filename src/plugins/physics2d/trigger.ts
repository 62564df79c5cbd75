/**
 * Trigger Tracking
 *
 * Remembers which trigger pairs overlapped last tick so each tick's overlaps
 * can be classified as enter (new), stay (continuing) or exit (ended, or one
 * side no longer exists).
 */

import type { EntityId } from '../../core/entity-id';

// ============================================
// Trigger Event
// ============================================

export type CollisionEventKind = 'enter' | 'stay' | 'exit';

/** `a` is always the lower id of the pair. */
export interface CollisionEvent {
    kind: CollisionEventKind;
    a: EntityId;
    b: EntityId;
}

export interface EntityPair {
    a: EntityId;
    b: EntityId;
}

export function comparePairs(x: EntityPair, y: EntityPair): number {
    return x.a - y.a || x.b - y.b;
}

function pairKey(a: EntityId, b: EntityId): string {
    return `${a}:${b}`;
}

// ============================================
// Trigger State
// ============================================

export class TriggerTracker {
    private overlaps = new Map<string, EntityPair>();

    /**
     * Feed this tick's overlapping trigger pairs (each with a < b).
     * Returns enter/stay events in pair order followed by exit events in pair
     * order.
     */
    update(current: readonly EntityPair[]): CollisionEvent[] {
        const sorted = [...current].sort(comparePairs);
        const next = new Map<string, EntityPair>();
        const events: CollisionEvent[] = [];

        for (const pair of sorted) {
            const key = pairKey(pair.a, pair.b);
            if (next.has(key)) continue;
            next.set(key, { a: pair.a, b: pair.b });
            events.push({ kind: this.overlaps.has(key) ? 'stay' : 'enter', a: pair.a, b: pair.b });
        }

        const ended = [...this.overlaps.entries()]
            .filter(([key]) => !next.has(key))
            .map(([, pair]) => pair)
            .sort(comparePairs);
        for (const pair of ended) {
            events.push({ kind: 'exit', a: pair.a, b: pair.b });
        }

        this.overlaps = next;
        return events;
    }

    isOverlapping(a: EntityId, b: EntityId): boolean {
        return a < b ? this.overlaps.has(pairKey(a, b)) : this.overlaps.has(pairKey(b, a));
    }

    /** Ids currently overlapping `id`, ascending. */
    getOverlapping(id: EntityId): EntityId[] {
        const others: EntityId[] = [];
        for (const pair of this.overlaps.values()) {
            if (pair.a === id) others.push(pair.b);
            else if (pair.b === id) others.push(pair.a);
        }
        return others.sort((x, y) => x - y);
    }

    overlapCount(): number {
        return this.overlaps.size;
    }

    clear(): void {
        this.overlaps.clear();
    }
}
