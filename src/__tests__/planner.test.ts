import { describe, expect, it } from "vitest";
import { DedupLedger } from "../dedup";
import { directFetcher, planZone, toCandidateItem, zoneTarget } from "../planner";
import {
  calculateExpectedHotels,
  findRegion,
  listBusinessZones,
} from "../planner/plan";
import {
  FakeListSource,
  TIERS,
  makePlan,
  makeRegion,
  rawCandidate,
} from "./helpers";
import type { CandidateSource } from "../types";

const ZONE = { name: "Beijing Road", code: "z1" };

function context(source: CandidateSource, ledger = new DedupLedger()) {
  return { region: "Old Town", cityCode: "440100", ledger, fetch: directFetcher(source) };
}

describe("planZone", () => {
  it("carries deficits forward, then backfills in reverse skipping the last forward tier", async () => {
    const source = FakeListSource.ofSizes({ economy: 8, comfort: 2, upscale: 3, luxury: 2 });

    const result = await planZone(ZONE, TIERS, context(source));

    expect(source.requests.map((r) => [r.tier, r.pass, r.count])).toEqual([
      ["economy", "forward", 4],
      ["comfort", "forward", 6],
      ["upscale", "forward", 7],
      ["luxury", "forward", 6],
      ["upscale", "reverse", 4],
      ["comfort", "reverse", 4],
      ["economy", "reverse", 4],
    ]);
    expect(result.attempts.map((a) => a.actual)).toEqual([4, 2, 3, 2, 0, 0, 4]);
    expect(result.target).toBe(15);
    expect(result.accepted).toHaveLength(15);
    expect(result.shortfall).toBeNull();
  });

  it("stops the reverse pass once the zone is full", async () => {
    const source = FakeListSource.ofSizes({ economy: 4, comfort: 2, upscale: 10, luxury: 2 });

    const result = await planZone(ZONE, TIERS, context(source));

    // comfort short by 4 → upscale asked for 7 and delivers; luxury full
    expect(source.requests.map((r) => r.pass)).not.toContain("reverse");
    expect(result.accepted).toHaveLength(15);
  });

  it("reports a shortfall when both passes run dry", async () => {
    const tiers = TIERS.slice(0, 2);
    const source = FakeListSource.ofSizes({ economy: 2 });

    const result = await planZone(ZONE, tiers, context(source));

    expect(source.requests.map((r) => [r.tier, r.pass, r.count])).toEqual([
      ["economy", "forward", 4],
      ["comfort", "forward", 8],
      ["economy", "reverse", 8],
    ]);
    expect(result.accepted).toHaveLength(2);
    expect(result.shortfall).toEqual({
      region: "Old Town",
      zoneCode: "z1",
      zoneName: "Beijing Road",
      target: 10,
      actual: 2,
      shortfall: 8,
    });
  });

  it("never accepts more than the zone target", async () => {
    const source = FakeListSource.ofSizes({ economy: 50, comfort: 50, upscale: 50, luxury: 50 });
    const result = await planZone(ZONE, TIERS, context(source));
    expect(result.accepted).toHaveLength(zoneTarget(TIERS));
    expect(result.attempts.every((a) => a.actual <= a.requested)).toBe(true);
  });

  it("credits an item once per region across zones", async () => {
    const source = FakeListSource.ofSizes({ economy: 8, comfort: 2, upscale: 3, luxury: 2 });
    const ledger = new DedupLedger();

    const first = await planZone(ZONE, TIERS, context(source, ledger));
    const second = await planZone({ name: "Shamian Island", code: "z2" }, TIERS, context(source, ledger));

    const firstIds = new Set(first.accepted.map((i) => i.hotelId));
    expect(second.accepted.filter((i) => firstIds.has(i.hotelId))).toEqual([]);
    expect(second.accepted).toHaveLength(0);
    expect(second.shortfall?.shortfall).toBe(15);
  });

  it("drops invalid records without counting them", async () => {
    const source = new FakeListSource({
      economy: [
        rawCandidate("broken", 100, { name: null }),
        rawCandidate("e1", 100),
        rawCandidate("e2", 100),
        rawCandidate("e3", 100),
      ],
    });
    const tiers = [{ ...TIERS[0], targetCount: 3 }];

    const result = await planZone(ZONE, tiers, context(source));

    expect(result.accepted.map((i) => i.hotelId)).toEqual(["e1", "e2"]);
    expect(result.shortfall?.shortfall).toBe(1);
  });

  it("treats a failing tier as zero yield and moves on", async () => {
    const inventory = FakeListSource.ofSizes({ economy: 10, upscale: 10, luxury: 10 });
    const source: CandidateSource = {
      async fetchTier(request) {
        if (request.tier.level === "comfort") throw new Error("navigation timeout");
        return inventory.fetchTier(request);
      },
    };

    const result = await planZone(ZONE, TIERS, context(source));

    const comfort = result.attempts.find((a) => a.tier === "comfort" && a.pass === "forward");
    expect(comfort).toMatchObject({ requested: 6, actual: 0, failed: true });
    // 4 + 0 + 9 (3 + 6 carried) + 2
    expect(result.accepted).toHaveLength(15);
  });
});

describe("toCandidateItem", () => {
  it("classifies by price and keeps the fetch tier as provenance", () => {
    const item = toCandidateItem(rawCandidate("h1", 450, { name: " Grand  Hotel " }), {
      region: "Old Town",
      cityCode: "440100",
      zone: ZONE,
      tier: TIERS[0],
      tiers: TIERS,
    });

    expect(item).toMatchObject({
      hotelId: "h1",
      name: "GrandHotel",
      fetchedTier: "economy",
      classifiedTier: "comfort",
      zoneCode: "z1",
      cityCode: "440100",
    });
  });
});

describe("plan helpers", () => {
  const plan = makePlan([
    makeRegion(),
    makeRegion({ name: "CBD", zones: [{ name: "Zhujiang New Town", code: "z9" }] }),
  ]);

  it("lists every business zone with its region", () => {
    expect(listBusinessZones(plan)).toEqual([
      { region: "Old Town", zoneName: "Beijing Road", zoneCode: "z1" },
      { region: "Old Town", zoneName: "Shamian Island", zoneCode: "z2" },
      { region: "CBD", zoneName: "Zhujiang New Town", zoneCode: "z9" },
    ]);
  });

  it("finds regions by name", () => {
    expect(findRegion(plan, " cbd ")?.name).toBe("CBD");
    expect(findRegion(plan, "Airport")).toBeNull();
  });

  it("calculates the expected hotel count", () => {
    expect(calculateExpectedHotels(plan)).toEqual({
      total: 45,
      breakdown: {
        "Old Town": { zones: 2, hotelsPerZone: 15, total: 30 },
        CBD: { zones: 1, hotelsPerZone: 15, total: 15 },
      },
    });
  });
});
