/**
 * Recommendation Policy
 *
 * Threshold filter applied to stored vacation spots before they are offered
 * to the text-generation model. A null metric never satisfies a threshold.
 */

import type { VacationSpot } from "@/lib/domain/types";

export interface RecommendationPolicy {
  minPunctualPct: number; // punctual_pct >= this
  minTemperatureF: number; // avg_temperature_air_f >= this
  minKoreanRestaurants: number; // korean_restaurant_cnt >= this
  requireZooOrAquarium: boolean; // zoo_cnt > 0 or aquarium_cnt > 0
}

export const DEFAULT_POLICY: RecommendationPolicy = {
  minPunctualPct: 50,
  minTemperatureF: 70,
  minKoreanRestaurants: 1,
  requireZooOrAquarium: true,
};

export function matchesPolicy(
  spot: VacationSpot,
  policy: RecommendationPolicy = DEFAULT_POLICY
): boolean {
  if (spot.punctualPct < policy.minPunctualPct) return false;
  if (spot.avgTemperatureAirF === null || spot.avgTemperatureAirF < policy.minTemperatureF) {
    return false;
  }
  if (spot.koreanRestaurantCnt < policy.minKoreanRestaurants) return false;
  if (policy.requireZooOrAquarium && spot.zooCnt <= 0 && spot.aquariumCnt <= 0) {
    return false;
  }
  return true;
}

/**
 * Most punctual first, then lowest emissions, then city/airport so the
 * payload is the same on every run over the same table.
 */
function compareSpots(a: VacationSpot, b: VacationSpot): number {
  return (
    b.punctualPct - a.punctualPct ||
    a.co2EmissionsKgPerPerson - b.co2EmissionsKgPerPerson ||
    a.city.localeCompare(b.city) ||
    a.airport.localeCompare(b.airport)
  );
}

/**
 * Filter spots by the policy and keep the best `limit` of them.
 */
export function selectDestinations(
  spots: VacationSpot[],
  policy: RecommendationPolicy,
  limit: number
): VacationSpot[] {
  return spots
    .filter((s) => matchesPolicy(s, policy))
    .sort(compareSpots)
    .slice(0, Math.max(0, limit));
}
