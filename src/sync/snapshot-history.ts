/**
 * Snapshot History
 *
 * Keeps the most recent world snapshots by tick. The server uses them as
 * delta baselines for each client's last acknowledged tick; the client
 * keeps the states it has reconstructed so later deltas can build on them.
 */

import type { WorldSnapshot } from './state-delta';

export class SnapshotHistory {
  private snapshots: Map<number, WorldSnapshot> = new Map();

  constructor(private maxTicks: number = 64) {}

  /**
   * Save a snapshot, pruning those more than maxTicks older than it.
   */
  save(snapshot: WorldSnapshot): void {
    this.snapshots.set(snapshot.tick, snapshot);

    const minTick = snapshot.tick - this.maxTicks + 1;
    for (const tick of this.snapshots.keys()) {
      if (tick < minTick) {
        this.snapshots.delete(tick);
      }
    }
  }

  get(tick: number): WorldSnapshot | undefined {
    return this.snapshots.get(tick);
  }

  has(tick: number): boolean {
    return this.snapshots.has(tick);
  }

  /**
   * Get newest available snapshot.
   */
  latest(): WorldSnapshot | undefined {
    let newest: WorldSnapshot | undefined;
    for (const snapshot of this.snapshots.values()) {
      if (newest === undefined || snapshot.tick > newest.tick) {
        newest = snapshot;
      }
    }
    return newest;
  }

  getOldestTick(): number | undefined {
    let oldest: number | undefined;
    for (const tick of this.snapshots.keys()) {
      if (oldest === undefined || tick < oldest) {
        oldest = tick;
      }
    }
    return oldest;
  }

  /**
   * Drop every snapshot older than `tick`.
   */
  discardBefore(tick: number): void {
    for (const t of this.snapshots.keys()) {
      if (t < tick) this.snapshots.delete(t);
    }
  }

  clear(): void {
    this.snapshots.clear();
  }

  get size(): number {
    return this.snapshots.size;
  }
}
