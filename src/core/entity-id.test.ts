import { describe, test, expect } from 'vitest';
import { EntityIdAllocator, entityGeneration, entityIndex, makeEntityId } from './entity-id';

describe('EntityIdAllocator', () => {
  test('allocates sequential indices at generation 0', () => {
    const ids = new EntityIdAllocator(8);
    expect(ids.allocate()).toBe(0);
    expect(ids.allocate()).toBe(1);
    expect(ids.allocate()).toBe(2);
    expect(ids.getActiveCount()).toBe(3);
  });

  test('reuses the lowest freed index with the next generation', () => {
    const ids = new EntityIdAllocator(8);
    const a = ids.allocate();
    const b = ids.allocate();
    ids.allocate();

    ids.free(b);
    ids.free(a);
    const reused = ids.allocate();

    expect(entityIndex(reused)).toBe(0);
    expect(entityGeneration(reused)).toBe(1);
    expect(reused).toBe(makeEntityId(0, 1));
    expect(ids.isValid(a)).toBe(false);
    expect(ids.isValid(reused)).toBe(true);
  });

  test('free reports stale ids', () => {
    const ids = new EntityIdAllocator(4);
    const a = ids.allocate();
    expect(ids.free(a)).toBe(true);
    expect(ids.free(a)).toBe(false);
    expect(ids.getActiveCount()).toBe(0);
  });

  test('throws when capacity is exhausted', () => {
    const ids = new EntityIdAllocator(2);
    ids.allocate();
    ids.allocate();
    expect(() => ids.allocate()).toThrow('Entity limit exceeded');
  });

  test('allocateSpecific mirrors a given id and frees skipped indices', () => {
    const ids = new EntityIdAllocator(16);
    const mirrored = makeEntityId(3, 5);

    expect(ids.allocateSpecific(mirrored)).toBe(true);
    expect(ids.isValid(mirrored)).toBe(true);
    expect(ids.allocateSpecific(mirrored)).toBe(false);

    // Indices 0..2 were skipped and are handed out next, lowest first
    expect(ids.allocate()).toBe(0);
    expect(ids.allocate()).toBe(1);
    expect(ids.allocate()).toBe(2);
    expect(ids.allocate()).toBe(4);
  });
});
