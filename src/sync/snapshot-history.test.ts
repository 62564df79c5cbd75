import { describe, test, expect } from 'vitest';
import { SnapshotHistory } from './snapshot-history';
import type { WorldSnapshot } from './state-delta';

function snapshot(tick: number): WorldSnapshot {
  return { tick, entities: new Map() };
}

describe('SnapshotHistory', () => {
  test('keeps the newest maxTicks ticks', () => {
    const history = new SnapshotHistory(3);
    for (let tick = 1; tick <= 5; tick++) history.save(snapshot(tick));

    expect(history.size).toBe(3);
    expect(history.has(2)).toBe(false);
    expect(history.get(3)?.tick).toBe(3);
    expect(history.getOldestTick()).toBe(3);
    expect(history.latest()?.tick).toBe(5);
  });

  test('gaps prune by tick distance', () => {
    const history = new SnapshotHistory(4);
    history.save(snapshot(1));
    history.save(snapshot(2));
    history.save(snapshot(10));

    expect(history.size).toBe(1);
    expect(history.get(10)?.tick).toBe(10);
  });

  test('discardBefore and clear', () => {
    const history = new SnapshotHistory(8);
    for (let tick = 1; tick <= 4; tick++) history.save(snapshot(tick));

    history.discardBefore(3);
    expect(history.getOldestTick()).toBe(3);
    expect(history.size).toBe(2);

    history.clear();
    expect(history.latest()).toBeUndefined();
    expect(history.getOldestTick()).toBeUndefined();
  });
});
