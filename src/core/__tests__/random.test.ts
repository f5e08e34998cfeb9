import { describe, expect, it } from 'vitest';
import { pickOne, sequenceRandom } from '../random.js';

describe('random', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];

  it('maps draws uniformly onto list positions', () => {
    expect(pickOne(sequenceRandom([0]), items)).toBe('a');
    expect(pickOne(sequenceRandom([0.5]), items)).toBe('c');
    expect(pickOne(sequenceRandom([0.99]), items)).toBe('e');
  });

  it('cycles through a fixed sequence', () => {
    const random = sequenceRandom([0.1, 0.7]);
    expect([random.next(), random.next(), random.next()]).toEqual([
      0.1, 0.7, 0.1,
    ]);
  });

  it('rejects empty inputs', () => {
    expect(() => pickOne(sequenceRandom([0]), [])).toThrow(
      'Cannot pick from an empty list'
    );
    expect(() => sequenceRandom([])).toThrow();
  });
});
