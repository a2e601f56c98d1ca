/**
 * Seeded deterministic RNG for Money Journey.
 *
 * Uses Mulberry32, a deterministic 32-bit PRNG.
 * Same seed always produces the same sequence of numbers.
 *
 * Design:
 * - Player seed → deriveMonthSeed(seed, month) → deriveStreamSeed(monthSeed, streamId)
 * - Each simulated month gets fresh RNG instances, so the outcome of month N does
 *   not depend on whether it was reached one month at a time or in a 3/6-month batch
 * - 3 streams: events, effects, assets
 */

// ── Mulberry32 PRNG ──────────────────────────────────────────────

export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0; // ensure 32-bit integer
  }

  /** Returns a float in [0, 1) */
  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Returns an integer in [min, max] (inclusive) */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }
}

// ── Seed Derivation ──────────────────────────────────────────────

/** Simple 32-bit hash combining two integers */
function hashTwo(a: number, b: number): number {
  let h = (a ^ (b * 0x9e3779b9)) | 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  return (h ^ (h >>> 16)) | 0;
}

/** Derive a month-specific seed from the player seed */
export function deriveMonthSeed(playerSeed: number, month: number): number {
  return hashTwo(playerSeed, month);
}

/** Derive a stream-specific seed from the month seed */
export function deriveStreamSeed(monthSeed: number, streamId: string): number {
  const streamNum = streamId.split('').reduce((sum, c) => ((sum * 31) + c.charCodeAt(0)) | 0, 0);
  return hashTwo(monthSeed, streamNum);
}

// ── Stream IDs ───────────────────────────────────────────────────

export const STREAM_IDS = {
  events: 'events',
  effects: 'effects',
  assets: 'assets',
} as const;

// ── RNG Streams ──────────────────────────────────────────────────

export interface RngStreams {
  events: SeededRng;
  effects: SeededRng;
  assets: SeededRng;
}

/** Create all 3 RNG streams for a given player seed + month */
export function createRngStreams(playerSeed: number, month: number): RngStreams {
  const monthSeed = deriveMonthSeed(playerSeed, month);
  return {
    events: new SeededRng(deriveStreamSeed(monthSeed, STREAM_IDS.events)),
    effects: new SeededRng(deriveStreamSeed(monthSeed, STREAM_IDS.effects)),
    assets: new SeededRng(deriveStreamSeed(monthSeed, STREAM_IDS.assets)),
  };
}

// ── Random Seed Generator ────────────────────────────────────────

/** Generate a random seed for a new character */
export function generateRandomSeed(): number {
  return (Math.random() * 0x7fffffff) | 0;
}
