/**
 * Seeded Random Number Generator for deterministic simulation
 * xoshiro128** over four 32-bit words, seeded through splitmix32
 */

export interface RNGState {
  a: number;
  b: number;
  c: number;
  d: number;
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

export class SeededRNG {
  private state: RNGState;

  constructor(seed: number) {
    this.state = this.initializeFromSeed(seed);
  }

  private initializeFromSeed(seed: number): RNGState {
    let s = seed >>> 0;

    const splitmix32 = (): number => {
      s = (s + 0x9e3779b9) >>> 0;
      let z = s;
      z = Math.imul(z ^ (z >>> 16), 0x21f0aaad);
      z = Math.imul(z ^ (z >>> 15), 0x735a2d97);
      return (z ^ (z >>> 15)) >>> 0;
    };

    const state = { a: splitmix32(), b: splitmix32(), c: splitmix32(), d: splitmix32() };
    if ((state.a | state.b | state.c | state.d) === 0) {
      state.a = 1; // all-zero state is a fixed point
    }
    return state;
  }

  /**
   * Get current state for serialization
   */
  getState(): RNGState {
    return { ...this.state };
  }

  /**
   * Restore from serialized state
   */
  setState(state: RNGState): void {
    this.state = { ...state };
  }

  /**
   * Generate next random uint32
   */
  private next(): number {
    const st = this.state;
    const result = Math.imul(rotl(Math.imul(st.b, 5) >>> 0, 7), 9) >>> 0;
    const t = (st.b << 9) >>> 0;

    st.c = (st.c ^ st.a) >>> 0;
    st.d = (st.d ^ st.b) >>> 0;
    st.b = (st.b ^ st.c) >>> 0;
    st.a = (st.a ^ st.d) >>> 0;
    st.c = (st.c ^ t) >>> 0;
    st.d = rotl(st.d, 11);

    return result;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Generate random float in [min, max)
   */
  randomRange(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  /**
   * Generate random integer in [min, max] inclusive
   */
  randomInt(min: number, max: number): number {
    return Math.floor(this.randomRange(min, max + 1));
  }

  /**
   * Weighted random selection over the normalized cumulative distribution.
   * Items are scanned in the given order; zero weights are never picked.
   */
  weightedPick<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length !== weights.length) {
      throw new Error('Items and weights must have same length');
    }
    if (items.length === 0) {
      throw new Error('Cannot pick from empty array');
    }

    const totalWeight = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
    if (totalWeight <= 0) {
      return items[0];
    }

    const roll = this.random();
    let cumulative = 0;
    let lastPositive = 0;

    for (let i = 0; i < items.length; i++) {
      const w = Math.max(0, weights[i]);
      if (w === 0) continue;
      lastPositive = i;
      cumulative += w / totalWeight;
      if (roll < cumulative) {
        return items[i];
      }
    }

    // Floating point shortfall of the final cumulative sum
    return items[lastPositive];
  }
}

/**
 * Create a hash from state for determinism verification
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj, (_, value) => {
    if (value instanceof Map) {
      return Array.from(value.entries()).sort((a, b) =>
        String(a[0]).localeCompare(String(b[0]))
      );
    }
    return value;
  });

  // Simple hash function (djb2)
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}
