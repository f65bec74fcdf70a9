import { z } from "zod";
import { executeQuery } from "@/lib/warehouse/sql-client";
import { NullableNumericColumn, NumericColumn } from "@/lib/validation";
import type { CityWeather } from "@/lib/domain/types";
import { majorUsCitiesCte, type SourceTables } from "./sources";

const CityWeatherRowSchema = z
  .object({
    geo_id: z.string(),
    geo_name: z.string(),
    total_population: NumericColumn,
    avg_temperature_air_f: NullableNumericColumn,
    avg_relative_humidity_pct: NullableNumericColumn,
    avg_cloud_cover_pct: NullableNumericColumn,
    precipitation_probability_pct: NullableNumericColumn,
  })
  .transform(
    (r): CityWeather => ({
      geoId: r.geo_id,
      cityName: r.geo_name,
      totalPopulation: r.total_population,
      avgTemperatureAirF: r.avg_temperature_air_f,
      avgRelativeHumidityPct: r.avg_relative_humidity_pct,
      avgCloudCoverPct: r.avg_cloud_cover_pct,
      precipitationProbabilityPct: r.precipitation_probability_pct,
    })
  );

/**
 * Two-week forecast averaged per zip code, then per major US city.
 *
 * NOTE: the free forecast listing only covers the US, so zip codes are
 * restricted to country = 'US'.
 */
export function buildCityWeatherSql(t: SourceTables): string {
  return `
    WITH major_us_cities AS (${majorUsCitiesCte(t)}
    ),
    zip_codes_in_city AS (
      SELECT
        city.geo_id AS city_geo_id,
        city.related_geo_name AS zip_geo_name
      FROM ${t.poiGeographyRelationships} country
      JOIN ${t.poiGeographyRelationships} city ON country.related_geo_id = city.geo_id
      WHERE country.geo_id = 'country/USA'
        AND city.level = 'City'
        AND city.related_level = 'CensusZipCodeTabulationArea'
    ),
    weather_forecast AS (
      SELECT
        postal_code,
        AVG(avg_temperature_air_2m_f) AS avg_temperature_air_f,
        AVG(avg_humidity_relative_2m_pct) AS avg_relative_humidity_pct,
        AVG(avg_cloud_cover_tot_pct) AS avg_cloud_cover_pct,
        AVG(probability_of_precipitation_pct) AS precipitation_probability_pct
      FROM ${t.forecastDay}
      WHERE country = 'US'
      GROUP BY postal_code
    )
    SELECT
      city.geo_id,
      city.geo_name,
      city.total_population,
      AVG(weather.avg_temperature_air_f) AS avg_temperature_air_f,
      AVG(weather.avg_relative_humidity_pct) AS avg_relative_humidity_pct,
      AVG(weather.avg_cloud_cover_pct) AS avg_cloud_cover_pct,
      AVG(weather.precipitation_probability_pct) AS precipitation_probability_pct
    FROM major_us_cities city
    JOIN zip_codes_in_city zip ON city.geo_id = zip.city_geo_id
    JOIN weather_forecast weather ON zip.zip_geo_name = weather.postal_code
    GROUP BY city.geo_id, city.geo_name, city.total_population
  `;
}

export async function fetchCityWeather(tables: SourceTables): Promise<CityWeather[]> {
  const result = await executeQuery(buildCityWeatherSql(tables), CityWeatherRowSchema, {
    label: "city weather",
  });
  return result.rows;
}
