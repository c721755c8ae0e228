/**
 * Seeded pseudo-random source shared by one simulation (mulberry32).
 * Every random decision of a run goes through it, so a seed plus the same
 * sequence of commands replays the run exactly.
 */
export class SimRng {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  int(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  /** Integer in [min, maxExclusive); an empty range yields `min`. */
  range(min: number, maxExclusive: number): number {
    if (maxExclusive <= min) return min;
    return min + this.int(maxExclusive - min);
  }

  float(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  bytes(n: number): Uint8Array {
    const out = new Uint8Array(n);
    for (let i = 0; i < n; i++) out[i] = this.int(256);
    return out;
  }

  choose<T>(items: readonly T[]): T | undefined {
    return items.length === 0 ? undefined : items[this.int(items.length)];
  }

  /** `k` distinct items in draw order (partial Fisher-Yates on a copy). */
  sample<T>(items: readonly T[], k: number): T[] {
    const pool = [...items];
    const n = Math.min(k, pool.length);
    for (let i = 0; i < n; i++) {
      const j = i + this.int(pool.length - i);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, n);
  }
}

export const randomSeed = (): number => Math.floor(Math.random() * 0xffffffff) >>> 0;
