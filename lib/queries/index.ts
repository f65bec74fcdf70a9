/**
 * Source extraction: runs every extractor in one shared warehouse session.
 */

import { withSharedSession } from "@/lib/warehouse/sql-client";
import type { SourceSnapshot } from "@/lib/domain/types";
import { fetchCityAttractions } from "./city-attractions";
import { fetchCityWeather } from "./city-weather";
import { fetchFlightEmissions } from "./flight-emissions";
import { fetchFlightPunctuality } from "./flight-punctuality";
import type { SourceTables } from "./sources";

export async function extractSources(origin: string, tables: SourceTables): Promise<SourceSnapshot> {
  const t0 = Date.now();
  const snapshot = await withSharedSession(async () => {
    const [emissions, punctuality, weather, attractions] = await Promise.all([
      fetchFlightEmissions(origin, tables),
      fetchFlightPunctuality(origin, tables),
      fetchCityWeather(tables),
      fetchCityAttractions(tables),
    ]);
    return { emissions, punctuality, weather, attractions };
  });

  console.log(
    `[extract] origin=${origin} emissions=${snapshot.emissions.length} punctuality=${snapshot.punctuality.length} ` +
      `weather=${snapshot.weather.length} attractions=${snapshot.attractions.length} in ${Date.now() - t0}ms`
  );
  return snapshot;
}

export { resolveSourceTables, DEFAULT_SOURCE_TABLES, type SourceTables } from "./sources";
