import { describe, test, expect } from 'vitest';
import { PredictionHistory } from './prediction-history';
import type { PredictionEntry } from './types';

function entry(sequence: number): PredictionEntry {
    return {
        sequence,
        input: { sequence, tick: 0, move: { x: 0, y: 0 }, actionFlags: 0 },
        state: { archetype: 0, components: {} }
    };
}

function sequences(entries: PredictionEntry[]): number[] {
    return entries.map(e => e.sequence);
}

describe('PredictionHistory', () => {
    test('stores and finds entries by sequence', () => {
        const history = new PredictionHistory(8);
        history.push(entry(1));
        history.push(entry(2));

        expect(history.get(2)?.sequence).toBe(2);
        expect(history.get(3)).toBeUndefined();
        expect(history.size).toBe(2);
        expect(history.newestSequence).toBe(2);
    });

    test('overwritten slots are not returned', () => {
        const history = new PredictionHistory(4);
        for (let seq = 1; seq <= 6; seq++) history.push(entry(seq));

        expect(history.get(1)).toBeUndefined();
        expect(history.get(2)).toBeUndefined();
        expect(sequences(history.after(0))).toEqual([3, 4, 5, 6]);
        expect(history.size).toBe(4);
    });

    test('a sequence gap retires older entries', () => {
        const history = new PredictionHistory(4);
        history.push(entry(1));
        history.push(entry(10));

        expect(history.get(1)).toBeUndefined();
        expect(history.size).toBe(1);
        expect(sequences(history.after(0))).toEqual([10]);
    });

    test('sequences must increase', () => {
        const history = new PredictionHistory(4);
        history.push(entry(3));

        expect(() => history.push(entry(3))).toThrow('Sequence 3 is not after 3');
        expect(() => history.push(entry(2))).toThrow(RangeError);
    });

    test('after returns later entries in order', () => {
        const history = new PredictionHistory(8);
        for (let seq = 1; seq <= 5; seq++) history.push(entry(seq));

        expect(sequences(history.after(3))).toEqual([4, 5]);
        expect(history.after(5)).toEqual([]);
    });

    test('discardBefore keeps the acknowledged entry and later ones', () => {
        const history = new PredictionHistory(8);
        for (let seq = 1; seq <= 5; seq++) history.push(entry(seq));

        history.discardBefore(3);

        expect(history.get(2)).toBeUndefined();
        expect(history.get(3)?.sequence).toBe(3);
        expect(history.size).toBe(3);
    });

    test('clear allows sequences to start over', () => {
        const history = new PredictionHistory(4);
        history.push(entry(7));
        history.clear();

        history.push(entry(1));
        expect(sequences(history.after(0))).toEqual([1]);
        expect(history.newestSequence).toBe(1);
    });

    test('capacity must be a positive integer', () => {
        expect(() => new PredictionHistory(0)).toThrow('PredictionHistory capacity must be a positive integer, got 0');
        expect(() => new PredictionHistory(2.5)).toThrow(RangeError);
    });
});
