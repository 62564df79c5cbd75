/**
 * Spatial Hash Grid for Broad Phase Collision Detection
 *
 * Divides the world into fixed-size cells. An entity is registered in every
 * cell its AABB touches, so a region query returns a superset of the
 * entities overlapping the region: false positives are allowed, misses are
 * not.
 */

import type { EntityId } from '../../core/entity-id';
import type { AABB2D } from './shapes';

export interface SpatialStats {
    entityCount: number;
    cellCount: number;
    maxPerCell: number;
    avgPerCell: number;
}

export class SpatialHash2D {
    private readonly invCellSize: number;
    private cells: Map<number, Set<EntityId>> = new Map();
    private entityCells: Map<EntityId, number[]> = new Map();

    /**
     * @param cellSize Edge length of each cell (ideally >= the typical hitbox size)
     */
    constructor(cellSize: number = 64) {
        if (!(cellSize > 0)) {
            throw new Error(`Cell size must be positive, got ${cellSize}`);
        }
        this.invCellSize = 1 / cellSize;
    }

    /**
     * Pack cell coordinates into an integer key: (x << 16) | y.
     * Coordinates wrap at 16 bits; wrapped cells alias, which only adds
     * false positives.
     */
    static cellKey(cellX: number, cellY: number): number {
        return (((cellX & 0xFFFF) << 16) | (cellY & 0xFFFF)) >>> 0;
    }

    cellCoord(value: number): number {
        return Math.floor(value * this.invCellSize);
    }

    /**
     * Keys of every cell the box touches.
     */
    keysFor(aabb: AABB2D): number[] {
        const minCX = this.cellCoord(aabb.minX);
        const minCY = this.cellCoord(aabb.minY);
        const maxCX = this.cellCoord(aabb.maxX);
        const maxCY = this.cellCoord(aabb.maxY);

        const keys: number[] = [];
        for (let cx = minCX; cx <= maxCX; cx++) {
            for (let cy = minCY; cy <= maxCY; cy++) {
                const key = SpatialHash2D.cellKey(cx, cy);
                if (!keys.includes(key)) keys.push(key);
            }
        }
        return keys;
    }

    /**
     * Insert an entity. Re-inserting an existing entity moves it.
     */
    insert(id: EntityId, aabb: AABB2D): void {
        if (this.entityCells.has(id)) {
            this.remove(id);
        }

        const keys = this.keysFor(aabb);
        for (const key of keys) {
            let cell = this.cells.get(key);
            if (!cell) {
                cell = new Set();
                this.cells.set(key, cell);
            }
            cell.add(id);
        }
        this.entityCells.set(id, keys);
    }

    update(id: EntityId, aabb: AABB2D): void {
        this.insert(id, aabb);
    }

    remove(id: EntityId): boolean {
        const keys = this.entityCells.get(id);
        if (!keys) return false;

        for (const key of keys) {
            const cell = this.cells.get(key);
            if (!cell) continue;
            cell.delete(id);
            if (cell.size === 0) this.cells.delete(key);
        }
        this.entityCells.delete(id);
        return true;
    }

    has(id: EntityId): boolean {
        return this.entityCells.has(id);
    }

    /**
     * Every entity registered in a cell the region touches.
     */
    queryRegion(aabb: AABB2D): Set<EntityId> {
        const result = new Set<EntityId>();
        for (const key of this.keysFor(aabb)) {
            const cell = this.cells.get(key);
            if (!cell) continue;
            for (const id of cell) result.add(id);
        }
        return result;
    }

    /** Cell keys an entity currently occupies. */
    cellsOf(id: EntityId): readonly number[] {
        return this.entityCells.get(id) ?? [];
    }

    /**
     * Clear all cells.
     */
    clear(): void {
        this.cells.clear();
        this.entityCells.clear();
    }

    /**
     * Replace the whole index with the given entries.
     */
    rebuild(entries: Iterable<readonly [EntityId, AABB2D]>): void {
        this.clear();
        for (const [id, aabb] of entries) {
            this.insert(id, aabb);
        }
    }

    /**
     * Get statistics for debugging.
     */
    getStats(): SpatialStats {
        let maxPerCell = 0;
        let total = 0;

        for (const cell of this.cells.values()) {
            maxPerCell = Math.max(maxPerCell, cell.size);
            total += cell.size;
        }

        return {
            entityCount: this.entityCells.size,
            cellCount: this.cells.size,
            maxPerCell,
            avgPerCell: this.cells.size > 0 ? total / this.cells.size : 0
        };
    }
}
