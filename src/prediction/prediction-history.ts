/**
 * Prediction History
 *
 * Circular buffer of predicted inputs keyed by sequence. Slot index is
 * sequence % capacity; each slot remembers its sequence so overwritten
 * entries are never returned.
 */

import { createLogger } from '../logger';
import type { PredictionEntry } from './types';

const log = createLogger('client');

export class PredictionHistory {
    private slots: (PredictionEntry | undefined)[];
    private oldest = 0;
    private newest = -1;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`PredictionHistory capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<PredictionEntry | undefined>(capacity).fill(undefined);
    }

    /**
     * Append an entry. Sequences must increase; the oldest entry is
     * overwritten once the buffer is full.
     */
    push(entry: PredictionEntry): void {
        if (entry.sequence <= this.newest) {
            throw new RangeError(`Sequence ${entry.sequence} is not after ${this.newest}`);
        }

        const wasEmpty = this.size === 0;
        const index = entry.sequence % this.capacity;
        const evicted = this.slots[index];
        if (evicted) {
            log.debug(`prediction history full, dropped sequence ${evicted.sequence}`);
        }
        this.slots[index] = entry;

        if (wasEmpty) this.oldest = entry.sequence;
        this.newest = entry.sequence;
        this.oldest = Math.max(this.oldest, entry.sequence - this.capacity + 1);
    }

    get(sequence: number): PredictionEntry | undefined {
        if (sequence < this.oldest) return undefined;
        const entry = this.slots[sequence % this.capacity];
        return entry && entry.sequence === sequence ? entry : undefined;
    }

    /**
     * Entries with a sequence above `sequence`, ascending.
     */
    after(sequence: number): PredictionEntry[] {
        const result: PredictionEntry[] = [];
        for (let seq = Math.max(sequence + 1, this.oldest); seq <= this.newest; seq++) {
            const entry = this.get(seq);
            if (entry) result.push(entry);
        }
        return result;
    }

    /**
     * Forget every entry with a sequence below `sequence`.
     */
    discardBefore(sequence: number): void {
        for (let seq = this.oldest; seq < sequence && seq <= this.newest; seq++) {
            const index = seq % this.capacity;
            if (this.slots[index]?.sequence === seq) this.slots[index] = undefined;
        }
        this.oldest = Math.max(this.oldest, sequence);
    }

    get size(): number {
        let count = 0;
        for (const slot of this.slots) {
            if (slot && slot.sequence >= this.oldest) count++;
        }
        return count;
    }

    get newestSequence(): number {
        return this.newest;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.oldest = 0;
        this.newest = -1;
    }
}
