import type { DelayKind, DelayRange } from "../config";

export type Random = () => number;

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// Think time

export class PacingPolicy {
  constructor(
    private readonly ranges: Record<DelayKind, DelayRange>,
    private readonly random: Random = Math.random,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  nextDelay(kind: DelayKind): number {
    const { minMs, maxMs } = this.ranges[kind];
    return Math.round(minMs + this.random() * (maxMs - minMs));
  }

  async pause(kind: DelayKind): Promise<number> {
    const ms = this.nextDelay(kind);
    await this.wait(ms);
    return ms;
  }
}

// Slider motion

export interface MotionStep {
  dx: number;
  dy: number;
  dt: number;
}

/**
 * Drag path for a slider challenge. Steps advance 20-50px, shrinking over the
 * last stretch, with ±2px lateral jitter and 50-150ms per step plus an
 * occasional hesitation. The path ends exactly at `trackLength`.
 */
export function synthesizeMotion(trackLength: number, seed: number): MotionStep[] {
  if (!(trackLength > 0)) return [];

  const random = seededRandom(seed);
  const target = Math.floor(trackLength);
  const steps: MotionStep[] = [];
  let travelled = 0;

  while (travelled < target) {
    const left = target - travelled;
    let dx = randomInt(random, 20, 50);
    if (left < 60) {
      // decelerate near the end
      dx = Math.max(1, Math.ceil(dx * (left / 60)));
    }
    dx = Math.min(dx, left);

    let dt = randomInt(random, 50, 150);
    if (random() < 0.3) dt += randomInt(random, 50, 100);

    steps.push({ dx, dy: randomInt(random, -2, 2), dt });
    travelled += dx;
  }

  return steps;
}
