import { describe, it, expect } from 'vitest';
import { IdAllocator } from '../../src/parsers/id-allocator.js';

describe('IdAllocator', () => {
  it('starts at 1', () => {
    expect(new IdAllocator().next()).toBe(1);
  });

  it('skips reserved ids', () => {
    const ids = new IdAllocator([1, 2, 4]);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([3, 5, 6]);
  });

  it('skips ids reserved after construction', () => {
    const ids = new IdAllocator();
    ids.reserve(1);
    expect(ids.next()).toBe(2);
    expect(ids.has(2)).toBe(true);
  });

  it('allows reserving the same id twice', () => {
    const ids = new IdAllocator([3]);
    ids.reserve(3);
    expect(ids.has(3)).toBe(true);
    expect(ids.next()).toBe(1);
  });
});
