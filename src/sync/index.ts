/**
 * Sync Module
 *
 * Server side of replication: world captures, per-client deltas against
 * acknowledged baselines, and the authoritative server loop.
 */

export type { WorldSnapshot, EntityDeltaEntry, SnapshotDelta } from './state-delta';
export {
  FULL_SNAPSHOT_BASE,
  captureWorld,
  computeDelta,
  applyDelta,
  cloneEntityRecord
} from './state-delta';

export { SnapshotHistory } from './snapshot-history';

export type { ClientSession, GameServerOptions, ServerStats, SpawnPlayerHook } from './server';
export { GameServer } from './server';
