import { zoneTarget } from "./index";
import type { Region, SamplingPlan } from "../types";

export interface BusinessZoneRef {
  region: string;
  zoneName: string;
  zoneCode: string;
}

export function listBusinessZones(plan: SamplingPlan): BusinessZoneRef[] {
  return plan.regions.flatMap((region) =>
    region.zones.map((zone) => ({
      region: region.name,
      zoneName: zone.name,
      zoneCode: zone.code,
    })),
  );
}

export function findRegion(plan: SamplingPlan, name: string): Region | null {
  const wanted = name.trim().toLowerCase();
  return plan.regions.find((r) => r.name.toLowerCase() === wanted) ?? null;
}

export interface ExpectedHotels {
  total: number;
  breakdown: Record<
    string,
    { zones: number; hotelsPerZone: number; total: number }
  >;
}

/** Upper bound on hotels a full run can accept. */
export function calculateExpectedHotels(plan: SamplingPlan): ExpectedHotels {
  const breakdown: ExpectedHotels["breakdown"] = {};
  let total = 0;

  for (const region of plan.regions) {
    const hotelsPerZone = zoneTarget(region.tiers);
    const regionTotal = region.zones.length * hotelsPerZone;
    breakdown[region.name] = {
      zones: region.zones.length,
      hotelsPerZone,
      total: regionTotal,
    };
    total += regionTotal;
  }

  return { total, breakdown };
}
