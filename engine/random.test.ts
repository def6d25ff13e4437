import { describe, expect, it } from 'vitest';
import { SeededRandom } from './random';

describe('SeededRandom', () => {
  it('produces the same stream for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    const first = Array.from({ length: 20 }, () => a.next());
    const second = Array.from({ length: 20 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('keeps draws in [0, 1)', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('keeps nextInt within inclusive bounds', () => {
    const rng = new SeededRandom(99);
    const seen = new Set<number>();
    for (let i = 0; i < 600; i++) {
      const value = rng.nextInt(1, 6);
      expect(Number.isInteger(value)).toBe(true);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('shuffles without changing the multiset or the input', () => {
    const rng = new SeededRandom(3);
    const items = [1, 2, 2, 3, 4, 5];
    const shuffled = rng.shuffle(items);
    expect(items).toEqual([1, 2, 2, 3, 4, 5]);
    expect([...shuffled].sort()).toEqual(items);
  });

  it('samples distinct positions', () => {
    const rng = new SeededRandom(11);
    const picked = rng.sample(['a', 'b', 'c', 'd', 'e'], 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    expect(() => rng.sample(['a'], 2)).toThrow('sample larger than population');
  });

  it('rejects a choice from an empty list', () => {
    expect(() => new SeededRandom(1).choice([])).toThrow('choice called with empty array');
  });

  it('resumes from a saved state', () => {
    const rng = new SeededRandom(42);
    rng.next();
    rng.next();
    const saved = rng.getState();
    const expected = [rng.next(), rng.next(), rng.next()];

    const resumed = new SeededRandom(0);
    resumed.setState(saved);
    expect([resumed.next(), resumed.next(), resumed.next()]).toEqual(expected);
  });
});
