/**
 * Harmonizer: joins the extractor outputs into candidate destinations.
 *
 *   emissions ⋈ punctuality        on (departure, arrival)
 *             σ departure = origin
 *             arrival → city        via the airport lookup
 *   ⋈ weather                       on city name
 *   ⋈ attractions                   on the weather row's geo id
 *
 * All joins are inner joins: a route whose arrival airport is unknown, or a
 * city without weather or attraction data, is dropped without error.
 */

import type { AirportLookup } from "@/lib/domain/airports";
import {
  destinationKey,
  type CandidateDestination,
  type CityAttractions,
  type CityWeather,
  type SourceSnapshot,
} from "@/lib/domain/types";

export interface HarmonizeStats {
  routes: number;
  unmappedAirports: string[];
  missingWeather: string[];
  missingAttractions: string[];
}

export interface HarmonizeResult {
  rows: CandidateDestination[];
  stats: HarmonizeStats;
}

function routeKey(departure: string, arrival: string): string {
  return `${departure.toUpperCase()}|${arrival.toUpperCase()}`;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const existing = groups.get(k);
    if (existing) {
      existing.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

export function harmonize(
  sources: SourceSnapshot,
  origin: string,
  airports: AirportLookup
): HarmonizeResult {
  const home = origin.toUpperCase();

  const punctuality = new Map<string, number>();
  for (const p of sources.punctuality) {
    punctuality.set(routeKey(p.departureAirport, p.arrivalAirport), p.punctualPct);
  }

  const weatherByCity = groupBy<CityWeather>(sources.weather, (w) => w.cityName);
  const attractionsByGeo = new Map<string, CityAttractions>(
    sources.attractions.map((a) => [a.geoId, a])
  );

  const rows: CandidateDestination[] = [];
  const unmapped = new Set<string>();
  const noWeather = new Set<string>();
  const noAttractions = new Set<string>();
  let routes = 0;

  for (const e of sources.emissions) {
    if (e.departureAirport.toUpperCase() !== home) continue;

    const punctualPct = punctuality.get(routeKey(e.departureAirport, e.arrivalAirport));
    if (punctualPct === undefined) continue;
    routes++;

    const airport = e.arrivalAirport.toUpperCase();
    const city = airports.cityFor(airport);
    if (city === null) {
      unmapped.add(airport);
      continue;
    }

    const cityWeather = weatherByCity.get(city);
    if (!cityWeather) {
      noWeather.add(city);
      continue;
    }

    // Several major cities can share a name; each yields its own row.
    for (const w of cityWeather) {
      const att = attractionsByGeo.get(w.geoId);
      if (!att) {
        noAttractions.add(w.geoId);
        continue;
      }
      rows.push({
        city,
        airport,
        co2EmissionsKgPerPerson: e.co2EmissionsKgPerPerson,
        punctualPct,
        avgTemperatureAirF: w.avgTemperatureAirF,
        avgRelativeHumidityPct: w.avgRelativeHumidityPct,
        avgCloudCoverPct: w.avgCloudCoverPct,
        precipitationProbabilityPct: w.precipitationProbabilityPct,
        aquariumCnt: att.aquariumCnt,
        zooCnt: att.zooCnt,
        koreanRestaurantCnt: att.koreanRestaurantCnt,
      });
    }
  }

  return {
    rows,
    stats: {
      routes,
      unmappedAirports: [...unmapped].sort(),
      missingWeather: [...noWeather].sort(),
      missingAttractions: [...noAttractions].sort(),
    },
  };
}

/**
 * Collapse rows sharing a (city, airport) key. The last row for a key wins;
 * the key keeps the position of its first occurrence.
 */
export function dedupeDestinations(rows: CandidateDestination[]): CandidateDestination[] {
  const byKey = new Map<string, CandidateDestination>();
  for (const row of rows) {
    byKey.set(destinationKey(row), row);
  }
  return [...byKey.values()];
}
