import { describe, expect, it } from "vitest";
import { PacingPolicy, seededRandom, synthesizeMotion } from "../pacing";

const RANGES = {
  page: { minMs: 1000, maxMs: 2000 },
  request: { minMs: 3000, maxMs: 6000 },
  zone: { minMs: 5000, maxMs: 10000 },
  region: { minMs: 10000, maxMs: 20000 },
};

describe("PacingPolicy", () => {
  it("draws delays from the range of each kind", () => {
    expect(new PacingPolicy(RANGES, () => 0).nextDelay("page")).toBe(1000);
    expect(new PacingPolicy(RANGES, () => 0.5).nextDelay("zone")).toBe(7500);
    expect(new PacingPolicy(RANGES, () => 0.9999).nextDelay("region")).toBe(19999);
  });

  it("waits for the drawn delay", async () => {
    const waited: number[] = [];
    const policy = new PacingPolicy(RANGES, () => 0.25, async (ms) => {
      waited.push(ms);
    });

    await expect(policy.pause("request")).resolves.toBe(3750);
    expect(waited).toEqual([3750]);
  });
});

describe("seededRandom", () => {
  it("repeats its sequence for a seed", () => {
    const a = seededRandom(7);
    const b = seededRandom(7);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true);
  });
});

describe("synthesizeMotion", () => {
  it("ends exactly at the track length", () => {
    for (const seed of [1, 2, 3, 42, 1234]) {
      const steps = synthesizeMotion(300, seed);
      expect(steps.reduce((sum, s) => sum + s.dx, 0)).toBe(300);
    }
  });

  it("moves forward in bounded steps with small jitter", () => {
    const steps = synthesizeMotion(258, 99);
    for (const step of steps) {
      expect(step.dx).toBeGreaterThanOrEqual(1);
      expect(step.dx).toBeLessThanOrEqual(50);
      expect(Math.abs(step.dy)).toBeLessThanOrEqual(2);
      expect(step.dt).toBeGreaterThanOrEqual(50);
      expect(step.dt).toBeLessThanOrEqual(250);
    }
  });

  it("is a pure function of track length and seed", () => {
    expect(synthesizeMotion(300, 5)).toEqual(synthesizeMotion(300, 5));
    expect(synthesizeMotion(300, 5)).not.toEqual(synthesizeMotion(300, 6));
  });

  it("floors fractional tracks and returns nothing for empty ones", () => {
    expect(synthesizeMotion(10.7, 1).reduce((sum, s) => sum + s.dx, 0)).toBe(10);
    expect(synthesizeMotion(0, 1)).toEqual([]);
    expect(synthesizeMotion(-5, 1)).toEqual([]);
  });
});
