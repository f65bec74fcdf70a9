/**
 * Core domain types for the vacation spots pipeline.
 */

// ── Source extractor rows ──────────────────────────────────────────

/** Average per-seat emissions of a route (flight_emissions view) */
export interface FlightEmission {
  departureAirport: string;
  arrivalAirport: string;
  co2EmissionsKgPerPerson: number;
}

/** Share of on-time or early arrivals on a route (flight_punctuality view) */
export interface FlightPunctuality {
  departureAirport: string;
  arrivalAirport: string;
  punctualPct: number;
}

/** Two-week forecast averaged over a major city's zip codes */
export interface CityWeather {
  geoId: string;
  cityName: string;
  totalPopulation: number;
  avgTemperatureAirF: number | null;
  avgRelativeHumidityPct: number | null;
  avgCloudCoverPct: number | null;
  precipitationProbabilityPct: number | null;
}

/** Point-of-interest counts for a major city */
export interface CityAttractions {
  geoId: string;
  cityName: string;
  aquariumCnt: number;
  zooCnt: number;
  koreanRestaurantCnt: number;
}

/** Everything the harmonizer reads in one refresh cycle */
export interface SourceSnapshot {
  emissions: FlightEmission[];
  punctuality: FlightPunctuality[];
  weather: CityWeather[];
  attractions: CityAttractions[];
}

// ── Harmonized + stored rows ──────────────────────────────────────

/** One destination's joined metrics, keyed by (city, airport) */
export interface CandidateDestination {
  city: string;
  airport: string;
  co2EmissionsKgPerPerson: number;
  punctualPct: number;
  avgTemperatureAirF: number | null;
  avgRelativeHumidityPct: number | null;
  avgCloudCoverPct: number | null;
  precipitationProbabilityPct: number | null;
  aquariumCnt: number;
  zooCnt: number;
  koreanRestaurantCnt: number;
}

/** A row of <schema>.vacation_spots */
export interface VacationSpot extends CandidateDestination {
  /** Last time the metrics of this row changed */
  updatedAt: Date;
}

export type DestinationKey = Pick<CandidateDestination, "city" | "airport">;

export function destinationKey(row: DestinationKey): string {
  return `${row.city}\u0000${row.airport}`;
}

// ── Static collaborators ───────────────────────────────────────────

/** Origin of all flights considered (data/home.json) */
export interface HomeConfig {
  airport: string;
}
