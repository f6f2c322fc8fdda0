/** A source of uniform floats in [0, 1). `Math.random` satisfies it. */
export type Rng = () => number;

/** 32-bit LCG; same seed, same sequence. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

/** Integer in [min, max], both ends inclusive. */
export function randInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function uniform(rng: Rng, a: number, b: number): number {
  return a + (b - a) * rng();
}

export function choice<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new Error('Cannot choose from an empty list');
  return items[Math.floor(rng() * items.length)];
}

/** `k` distinct elements in random order (partial Fisher-Yates). */
export function sample<T>(rng: Rng, items: readonly T[], k: number): T[] {
  if (k > items.length) throw new Error(`Sample larger than population (${k} > ${items.length})`);
  const pool = items.slice();
  for (let i = 0; i < k; i++) {
    const j = i + Math.floor(rng() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, k);
}

/** `k` elements drawn independently, repeats allowed. */
export function choices<T>(rng: Rng, items: readonly T[], k: number): T[] {
  const out: T[] = [];
  for (let i = 0; i < k; i++) out.push(choice(rng, items));
  return out;
}
