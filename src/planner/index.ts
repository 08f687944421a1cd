/**
 * Segment quota planner.
 *
 * A zone's target is the sum of its tier targets. Tiers are fetched in
 * ascending price order; whatever a tier under-delivers is carried into the
 * next tier's request. If the zone is still short after the forward pass, a
 * reverse pass walks the tiers from the most expensive down, skipping the
 * first tier of the reversed order (the last one the forward pass tried),
 * asking each for the whole remaining deficit. A zone left short after both
 * passes is reported, never thrown.
 */

import type { DedupLedger } from "../dedup";
import { errorMessage } from "../errors";
import { logger } from "../logger";
import { classifyTier, normalizeHotelName } from "../normalizer";
import { validateCandidate } from "../validation";
import type {
  CandidateItem,
  CandidateSource,
  PlanPass,
  PriceTier,
  QuotaShortfallWarning,
  RawCandidate,
  TierAttempt,
  TierFetchRequest,
  Zone,
  ZonePlanResult,
} from "../types";

export interface TierFetchOutcome {
  candidates: RawCandidate[];
  taskId: string | null;
  failed: boolean;
  error: string | null;
}

/** One bounded fetch for a (zone, tier) cell. */
export type TierFetcher = (request: TierFetchRequest) => Promise<TierFetchOutcome>;

export interface ZoneContext {
  region: string;
  cityCode: string;
  ledger: DedupLedger;
  fetch: TierFetcher;
}

/** Per-zone bookkeeping; lives only for one planZone call. */
export interface QuotaState {
  targetTotal: number;
  remaining: number;
  carryOver: number;
}

/** Fetches straight from the source; a thrown error counts as a failed attempt. */
export function directFetcher(source: CandidateSource): TierFetcher {
  return async (request) => {
    try {
      return {
        candidates: await source.fetchTier(request),
        taskId: null,
        failed: false,
        error: null,
      };
    } catch (error) {
      logger.warn(
        `[PLAN] ${request.zone.name}/${request.tier.level} fetch failed: ${errorMessage(error)}`,
      );
      return { candidates: [], taskId: null, failed: true, error: errorMessage(error) };
    }
  };
}

export function zoneTarget(tiers: PriceTier[]): number {
  return tiers.reduce((sum, tier) => sum + tier.targetCount, 0);
}

export function toCandidateItem(
  raw: RawCandidate,
  context: { region: string; cityCode: string; zone: Zone; tier: PriceTier; tiers: PriceTier[] },
): CandidateItem | null {
  const validated = validateCandidate(raw);
  if (!validated.ok) {
    logger.warn(`[PLAN] Dropped invalid record: ${validated.error.message}`);
    return null;
  }
  const value = validated.value;
  return {
    hotelId: value.hotelId,
    name: normalizeHotelName(value.name),
    address: value.address,
    cityCode: context.cityCode,
    latitude: value.latitude,
    longitude: value.longitude,
    starLevel: value.starLevel,
    ratingScore: value.ratingScore,
    reviewCount: value.reviewCount,
    basePrice: value.basePrice,
    region: context.region,
    zoneName: context.zone.name,
    zoneCode: context.zone.code,
    fetchedTier: context.tier.level,
    classifiedTier: classifyTier(value.basePrice, context.tiers),
  };
}

export async function planZone(
  zone: Zone,
  tiers: PriceTier[],
  context: ZoneContext,
): Promise<ZonePlanResult> {
  const { region, ledger } = context;
  const target = zoneTarget(tiers);
  const quota: QuotaState = { targetTotal: target, remaining: target, carryOver: 0 };
  const accepted: CandidateItem[] = [];
  const attempts: TierAttempt[] = [];

  const attempt = async (
    tier: PriceTier,
    requested: number,
    pass: PlanPass,
  ): Promise<number> => {
    const outcome = await context.fetch({
      region,
      zone,
      tier,
      count: requested,
      pass,
      seen: ledger.seen(region),
    });

    let taken = 0;
    for (const raw of outcome.candidates) {
      if (taken >= requested) break;
      const item = toCandidateItem(raw, {
        region,
        cityCode: context.cityCode,
        zone,
        tier,
        tiers,
      });
      if (!item) continue;
      if (!ledger.accept(region, item.hotelId)) continue;
      accepted.push(item);
      taken++;
    }

    attempts.push({
      tier: tier.level,
      pass,
      requested,
      actual: taken,
      taskId: outcome.taskId,
      failed: outcome.failed,
    });
    quota.remaining -= taken;
    logger.debug(
      `[PLAN] ${zone.name}/${tier.level} ${pass}: ${taken}/${requested}`,
    );
    return taken;
  };

  // Forward pass
  for (const tier of tiers) {
    const requested = tier.targetCount + quota.carryOver;
    if (requested <= 0) continue;
    const actual = await attempt(tier, requested, "forward");
    quota.carryOver = Math.max(0, requested - actual);
  }

  // Reverse pass. Index 0 of the reversed order is skipped; whether that
  // tier should be re-queried is still an open product question.
  if (quota.remaining > 0) {
    const reversed = [...tiers].reverse();
    for (let idx = 0; idx < reversed.length; idx++) {
      if (quota.remaining <= 0) break;
      if (idx === 0) continue;
      await attempt(reversed[idx], quota.remaining, "reverse");
    }
  }

  let shortfall: QuotaShortfallWarning | null = null;
  if (quota.remaining > 0) {
    shortfall = {
      region,
      zoneCode: zone.code,
      zoneName: zone.name,
      target,
      actual: accepted.length,
      shortfall: quota.remaining,
    };
    logger.warn(
      `[PLAN] ${region} / ${zone.name} short by ${quota.remaining} (${accepted.length}/${target})`,
    );
  }

  return { region, zone, target, accepted, attempts, shortfall };
}
