/**
 * State Delta Computation
 *
 * Captures world state per tick and computes compact deltas between two
 * captures: only components that changed, plus ids that disappeared.
 */

import {
  COMPONENT_TYPES,
  ComponentRecordSet,
  ComponentType,
  componentBit,
  componentEquals,
  copyRecord,
  getRecord
} from '../core/component';
import type { EntityId } from '../core/entity-id';
import type { EntityRecord, World } from '../core/world';

/**
 * Every entity of a world at the end of one tick.
 */
export interface WorldSnapshot {
  tick: number;
  /** Iteration order is ascending id */
  entities: Map<EntityId, EntityRecord>;
}

/**
 * One entity's changes. `archetype` is the full set of components the
 * entity now carries; `mask` the subset whose data is included.
 */
export interface EntityDeltaEntry {
  entityId: EntityId;
  archetype: number;
  mask: number;
  components: ComponentRecordSet;
}

/**
 * Everything a client needs to move from `baseTick` to `tick`.
 * A baseTick of 0 marks a full snapshot.
 */
export interface SnapshotDelta {
  tick: number;
  baseTick: number;
  /** Last input sequence the server applied for the receiving client */
  ackSequence: number;
  entries: EntityDeltaEntry[];
  /** Ids present at baseTick and gone at tick, ascending */
  removed: EntityId[];
}

export const FULL_SNAPSHOT_BASE = 0;

/**
 * Deep copy of every live entity.
 */
export function captureWorld(world: World, tick: number): WorldSnapshot {
  const entities = new Map<EntityId, EntityRecord>();
  for (const id of world.entities()) {
    const record = world.snapshotEntity(id);
    if (record) entities.set(id, record);
  }
  return { tick, entities };
}

function changedComponent<K extends ComponentType>(
  type: K,
  prev: ComponentRecordSet,
  next: ComponentRecordSet
): boolean {
  const a = getRecord(prev, type);
  const b = getRecord(next, type);
  if (a === undefined || b === undefined) return a !== b;
  return !componentEquals(type, a, b);
}

function entryFor(id: EntityId, record: EntityRecord, mask: number): EntityDeltaEntry {
  const components: ComponentRecordSet = {};
  for (const type of COMPONENT_TYPES) {
    if ((mask & componentBit(type)) !== 0) {
      copyRecord(type, record.components, components);
    }
  }
  return { entityId: id, archetype: record.archetype, mask, components };
}

/**
 * Delta from `base` to `current`. Without a base the result is a full
 * snapshot carrying every component of every entity.
 */
export function computeDelta(
  base: WorldSnapshot | undefined,
  current: WorldSnapshot,
  ackSequence: number
): SnapshotDelta {
  const entries: EntityDeltaEntry[] = [];
  const ids = [...current.entities.keys()].sort((a, b) => a - b);

  for (const id of ids) {
    const record = current.entities.get(id);
    if (!record) continue;

    const prev = base?.entities.get(id);
    if (!prev) {
      entries.push(entryFor(id, record, record.archetype));
      continue;
    }

    let mask = 0;
    for (const type of COMPONENT_TYPES) {
      if ((record.archetype & componentBit(type)) === 0) continue;
      if (changedComponent(type, prev.components, record.components)) {
        mask |= componentBit(type);
      }
    }

    if (mask !== 0 || record.archetype !== prev.archetype) {
      entries.push(entryFor(id, record, mask));
    }
  }

  const removed: EntityId[] = [];
  if (base) {
    for (const id of base.entities.keys()) {
      if (!current.entities.has(id)) removed.push(id);
    }
    removed.sort((a, b) => a - b);
  }

  return {
    tick: current.tick,
    baseTick: base ? base.tick : FULL_SNAPSHOT_BASE,
    ackSequence,
    entries,
    removed
  };
}

/**
 * Rebuild the full state a delta describes. `base` must be the snapshot for
 * `delta.baseTick` (ignored for full snapshots).
 */
export function applyDelta(base: WorldSnapshot | undefined, delta: SnapshotDelta): WorldSnapshot {
  const entities = new Map<EntityId, EntityRecord>();

  if (delta.baseTick !== FULL_SNAPSHOT_BASE) {
    if (!base || base.tick !== delta.baseTick) {
      throw new Error(`Delta for tick ${delta.tick} needs base ${delta.baseTick}`);
    }
    for (const [id, record] of base.entities) {
      entities.set(id, cloneEntityRecord(record));
    }
  }

  for (const id of delta.removed) {
    entities.delete(id);
  }

  for (const entry of delta.entries) {
    const record = entities.get(entry.entityId) ?? { archetype: 0, components: {} };
    const components: ComponentRecordSet = {};
    for (const type of COMPONENT_TYPES) {
      if ((entry.archetype & componentBit(type)) === 0) continue;
      const source = (entry.mask & componentBit(type)) !== 0 ? entry.components : record.components;
      copyRecord(type, source, components);
    }
    entities.set(entry.entityId, { archetype: entry.archetype, components });
  }

  const sorted = new Map([...entities.entries()].sort((a, b) => a[0] - b[0]));
  return { tick: delta.tick, entities: sorted };
}

export function cloneEntityRecord(record: EntityRecord): EntityRecord {
  const components: ComponentRecordSet = {};
  for (const type of COMPONENT_TYPES) {
    copyRecord(type, record.components, components);
  }
  return { archetype: record.archetype, components };
}
