import type { CandidateDestination } from "@/lib/domain/types";

/** One destination as handed to the model, named after the target table columns */
export interface PayloadRecord {
  city: string;
  airport: string;
  co2_emissions_kg_per_person: number;
  punctual_pct: number;
  avg_temperature_air_f: number | null;
  avg_relative_humidity_pct: number | null;
  avg_cloud_cover_pct: number | null;
  precipitation_probability_pct: number | null;
  aquarium_cnt: number;
  zoo_cnt: number;
  korean_restaurant_cnt: number;
}

export function toPayloadRecord(row: CandidateDestination): PayloadRecord {
  return {
    city: row.city,
    airport: row.airport,
    co2_emissions_kg_per_person: row.co2EmissionsKgPerPerson,
    punctual_pct: row.punctualPct,
    avg_temperature_air_f: row.avgTemperatureAirF,
    avg_relative_humidity_pct: row.avgRelativeHumidityPct,
    avg_cloud_cover_pct: row.avgCloudCoverPct,
    precipitation_probability_pct: row.precipitationProbabilityPct,
    aquarium_cnt: row.aquariumCnt,
    zoo_cnt: row.zooCnt,
    korean_restaurant_cnt: row.koreanRestaurantCnt,
  };
}

/**
 * Serialize destinations to the JSON array embedded in the prompt.
 * An empty selection serializes to "[]".
 */
export function serializePayload(rows: CandidateDestination[]): string {
  return JSON.stringify(rows.map(toPayloadRecord));
}
