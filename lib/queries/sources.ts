/**
 * Marketplace source tables read by the extractors.
 *
 * The defaults are the catalogs the marketplace listings install under.
 * SOURCE_CATALOG swaps the catalog part of every name (e.g. when the
 * listings were mounted into a shared "marketplace" catalog).
 */

import { validateIdentifier, validateQualifiedName } from "@/lib/validation";

export interface SourceTables {
  /** OAG flight emissions schedules */
  emissions: string;
  /** OAG flight status (ingate timeliness) */
  flightStatus: string;
  /** Weather Source two-week daily forecast */
  forecastDay: string;
  /** Cybersyn Data Commons time series (population) */
  timeseries: string;
  geographyIndex: string;
  geographyRelationships: string;
  /** Cybersyn points of interest + addresses */
  poiGeographyRelationships: string;
  poiIndex: string;
  poiAddressRelationships: string;
  usAddresses: string;
}

export const DEFAULT_SOURCE_TABLES: SourceTables = {
  emissions: "oag_flight_emissions_data_sample.public.estimated_emissions_schedules_sample",
  flightStatus: "oag_flight_status_data_sample.public.flight_status_latest_sample",
  forecastDay: "global_weather__climate_data_for_bi.standard_tile.forecast_day",
  timeseries: "global_government.cybersyn.datacommons_timeseries",
  geographyIndex: "global_government.cybersyn.geography_index",
  geographyRelationships: "global_government.cybersyn.geography_relationships",
  poiGeographyRelationships: "us_addresses__poi.cybersyn.geography_relationships",
  poiIndex: "us_addresses__poi.cybersyn.point_of_interest_index",
  poiAddressRelationships: "us_addresses__poi.cybersyn.point_of_interest_addresses_relationships",
  usAddresses: "us_addresses__poi.cybersyn.us_addresses",
};

const SOURCE_TABLE_KEYS: ReadonlyArray<keyof SourceTables> = [
  "emissions",
  "flightStatus",
  "forecastDay",
  "timeseries",
  "geographyIndex",
  "geographyRelationships",
  "poiGeographyRelationships",
  "poiIndex",
  "poiAddressRelationships",
  "usAddresses",
];

function swapCatalog(name: string, catalog: string): string {
  const parts = name.split(".");
  return [catalog, ...parts.slice(1)].join(".");
}

export function resolveSourceTables(catalog: string | null): SourceTables {
  const safeCatalog = catalog === null ? null : validateIdentifier(catalog, "source catalog");
  const resolved = { ...DEFAULT_SOURCE_TABLES };
  for (const key of SOURCE_TABLE_KEYS) {
    const name = safeCatalog ? swapCatalog(resolved[key], safeCatalog) : resolved[key];
    resolved[key] = validateQualifiedName(name, `source table ${key}`);
  }
  return resolved;
}

/**
 * US cities with at least 100k residents since 2020, as a CTE body.
 * Shared by the weather and attractions extractors.
 */
export function majorUsCitiesCte(t: SourceTables): string {
  return `
    SELECT
      geo.geo_id,
      geo.geo_name,
      MAX(ts.value) AS total_population
    FROM ${t.timeseries} ts
    JOIN ${t.geographyIndex} geo ON ts.geo_id = geo.geo_id
    JOIN ${t.geographyRelationships} geo_rel ON geo_rel.related_geo_id = geo.geo_id
    WHERE ts.variable_name = 'Total Population, census.gov'
      AND ts.date >= '2020-01-01'
      AND geo.level = 'City'
      AND geo_rel.geo_id = 'country/USA'
      AND ts.value > 100000
    GROUP BY geo.geo_id, geo.geo_name`;
}
