/**
 * Source of uniform floats in [0, 1). Injected so tests can replay a
 * fixed sequence of draws.
 */
export interface RandomSource {
  next(): number;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('sequenceRandom needs at least one value');
  }
  let position = 0;
  return {
    next: () => {
      const value = values[position % values.length] ?? 0;
      position++;
      return value;
    },
  };
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(
    Math.floor(random.next() * items.length),
    items.length - 1
  );
  const item = items[index];
  if (item === undefined) {
    throw new Error(`No item at index ${index}`);
  }
  return item;
}
