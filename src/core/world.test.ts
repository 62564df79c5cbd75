import { describe, test, expect, beforeEach } from 'vitest';
import { World } from './world';
import { ComponentType, componentBit } from './component';
import { createCharacter, createHitbox, createTransform } from '../components';
import { InvalidEntityError } from '../errors';

const T = ComponentType.Transform;
const H = ComponentType.Hitbox;
const C = ComponentType.Character;

describe('World', () => {
  let world: World;

  beforeEach(() => {
    world = new World(1024);
  });

  test('archetype follows every committed add and remove', () => {
    const id = world.createEntity();
    expect(world.archetypeOf(id)).toBe(0);

    world.addComponent(id, T, createTransform());
    expect(world.archetypeOf(id)).toBe(componentBit(T));

    world.addComponent(id, H, createHitbox());
    expect(world.archetypeOf(id)).toBe(componentBit(T) | componentBit(H));

    world.removeComponent(id, T);
    expect(world.archetypeOf(id)).toBe(componentBit(H));
    expect(world.hasComponent(id, T)).toBe(false);
    expect(world.getComponent(id, T)).toBeUndefined();
  });

  test('query results never drift from component membership', () => {
    const ids = Array.from({ length: 12 }, () => world.createEntity());
    const types = [T, H, C];

    // Deterministic churn of adds and removes
    for (let step = 0; step < 60; step++) {
      const id = ids[(step * 7) % ids.length];
      const type = types[step % types.length];
      if (step % 4 === 3) {
        world.removeComponent(id, type);
      } else if (type === T) {
        world.addComponent(id, T, createTransform());
      } else if (type === H) {
        world.addComponent(id, H, createHitbox());
      } else {
        world.addComponent(id, C, createCharacter());
      }

      for (const required of [[T], [H], [T, H], [T, C], [T, H, C]]) {
        const expected = ids.filter(e => required.every(r => world.hasComponent(e, r))).sort((a, b) => a - b);
        const actual = world.query(required).toArray().sort((a, b) => a - b);
        expect(actual).toEqual(expected);
      }
    }
  });

  test('a stale id is rejected after its index is reused', () => {
    const stale = world.createEntity();
    world.addComponent(stale, T, createTransform({ position: { x: 1, y: 1 } }));
    world.destroyEntity(stale);

    const fresh = world.createEntity();
    world.addComponent(fresh, T, createTransform({ position: { x: 5, y: 5 } }));

    expect(world.isAlive(stale)).toBe(false);
    expect(world.getComponent(stale, T)).toBeUndefined();

    const result = world.addComponent(stale, H, createHitbox());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidEntityError);
      expect(result.error.entityId).toBe(stale);
    }

    world.destroyEntity(stale);
    expect(world.isAlive(fresh)).toBe(true);
    expect(world.getComponent(fresh, T)?.position).toEqual({ x: 5, y: 5 });
    expect(world.hasComponent(fresh, H)).toBe(false);
  });

  test('structural changes during iteration apply at flush', () => {
    const a = world.createEntity();
    world.addComponent(a, T, createTransform());

    let spawned = -1;
    world.deferred(() => {
      for (const id of world.query([T])) {
        world.destroyEntity(id);
        spawned = world.createEntity();
        world.addComponent(spawned, T, createTransform());
      }
      expect(world.isAlive(a)).toBe(true);
      expect(world.hasComponent(spawned, T)).toBe(false);
      expect(world.pendingCommands).toBe(3);
    });

    world.flush();
    expect(world.isAlive(a)).toBe(false);
    expect(world.query([T]).toArray()).toEqual([spawned]);
  });

  test('flush refuses to run while iterating', () => {
    world.deferred(() => {
      expect(() => world.flush()).toThrow('while systems are iterating');
    });
  });

  test('cached queries are evicted only by archetypes that match them', () => {
    const a = world.createEntity();
    world.addComponent(a, T, createTransform());
    world.query([T]).toArray();
    expect(world.isQueryCached([T])).toBe(true);

    const b = world.createEntity();
    world.addComponent(b, H, createHitbox());
    expect(world.isQueryCached([T])).toBe(true);

    world.addComponent(a, H, createHitbox());
    expect(world.isQueryCached([T])).toBe(false);
  });

  test('archetype stats count cache hits and misses', () => {
    const a = world.createEntity();
    world.addComponent(a, T, createTransform());

    expect(world.query([T]).toArray()).toEqual([a]);
    expect(world.query([T]).count()).toBe(1);

    expect(world.getArchetypeStats()).toEqual({ archetypes: 1, cachedQueries: 1, hits: 1, misses: 1 });
  });

  test('snapshotEntity and restoreEntity copy records', () => {
    const id = world.createEntity();
    world.addComponent(id, T, createTransform({ position: { x: 3, y: 4 } }));
    world.addComponent(id, C, createCharacter());

    const record = world.snapshotEntity(id);
    expect(record?.archetype).toBe(componentBit(T) | componentBit(C));

    const transform = world.getComponent(id, T);
    if (transform) transform.position.x = 99;
    expect(record?.components[T]?.position.x).toBe(3);

    world.addComponent(id, H, createHitbox());
    if (record) world.restoreEntity(id, record);
    expect(world.getComponent(id, T)?.position.x).toBe(3);
    expect(world.hasComponent(id, H)).toBe(false);
  });

  test('entities() lists live ids ascending', () => {
    const a = world.createEntity();
    const b = world.createEntity();
    const c = world.createEntity();
    world.destroyEntity(b);
    expect(world.entities()).toEqual([a, c]);
    expect(world.entityCount).toBe(2);
  });
});
