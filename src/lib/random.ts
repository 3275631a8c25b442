/** A source of uniform numbers in [0, 1), like Math.random. */
export type Random = () => number;

export const defaultRandom: Random = () => Math.random();

/**
 * mulberry32: small seeded PRNG, good enough for picking exercises
 * reproducibly in tests.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Picks up to `count` items without replacement. Each draw is proportional
 * to the remaining items' weights; all-equal weights give a uniform draw.
 */
export function weightedSample<T>(
  items: readonly T[],
  count: number,
  random: Random,
  weightOf: (item: T) => number = () => 1
): T[] {
  const pool = items.map((item) => ({ item, weight: Math.max(0, weightOf(item)) }));
  const picked: T[] = [];

  while (picked.length < count && pool.length > 0) {
    const total = pool.reduce((sum, p) => sum + p.weight, 0);
    let index = pool.length - 1;

    if (total > 0) {
      let target = random() * total;
      for (let i = 0; i < pool.length; i++) {
        target -= pool[i].weight;
        if (target < 0) {
          index = i;
          break;
        }
      }
    } else {
      index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    }

    const [entry] = pool.splice(index, 1);
    if (entry) picked.push(entry.item);
  }

  return picked;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
