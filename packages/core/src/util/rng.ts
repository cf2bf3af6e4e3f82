// Seedable random source shared by the mutation engine and its operators.
// No code in the core reads Math.random(); every draw goes through a
// RandomSource handed in by the caller.

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * Uniform source of floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * xorshift32 with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(scope); a zero state is
 * replaced by the FNV offset basis so the generator never sticks at 0.
 */
export class XorShift32 implements RandomSource {
  private x: number;

  constructor(seed: number, scope = '') {
    const initial = ((seed >>> 0) ^ fnv1a32(scope)) >>> 0;
    this.x = initial === 0 ? 2166136261 : initial;
  }

  /** Returns the next uint32 value. */
  nextUint32(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  next(): number {
    return this.nextUint32() / 0x100000000;
  }
}

export function createRandom(seed: number, scope = ''): RandomSource {
  return new XorShift32(seed, scope);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(random.next() * (max - min + 1));
}

/** True with the given probability. */
export function chance(random: RandomSource, probability: number): boolean {
  return random.next() < probability;
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(random.next() * items.length)];
}

/**
 * k distinct items in draw order (partial Fisher-Yates over a copy).
 */
export function sample<T>(random: RandomSource, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const count = Math.max(0, Math.min(k, pool.length));
  const out: T[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random.next() * (pool.length - i));
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) break;
    pool[j] = current;
    pool[i] = picked;
    out.push(picked);
  }
  return out;
}

/**
 * Weighted choice with a cumulative-weight array and a single uniform draw.
 * Entries with a non-positive weight are never chosen.
 */
export function weightedPick<T>(
  random: RandomSource,
  entries: ReadonlyArray<{ item: T; weight: number }>
): T | undefined {
  const cumulative: number[] = [];
  let total = 0;
  for (const entry of entries) {
    total += Math.max(0, entry.weight);
    cumulative.push(total);
  }
  if (total <= 0) return undefined;

  const draw = random.next() * total;
  for (let i = 0; i < cumulative.length; i++) {
    const bound = cumulative[i];
    const entry = entries[i];
    if (bound !== undefined && entry !== undefined && draw < bound && entry.weight > 0) {
      return entry.item;
    }
  }
  // Floating point residue: fall back to the last positively weighted entry
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i];
    if (entry && entry.weight > 0) return entry.item;
  }
  return undefined;
}
