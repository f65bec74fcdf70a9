import { z } from "zod";
import { executeQuery } from "@/lib/warehouse/sql-client";
import { NumericColumn } from "@/lib/validation";
import type { CityAttractions } from "@/lib/domain/types";
import { majorUsCitiesCte, type SourceTables } from "./sources";

/** POI categories counted per city; each maps to a *_cnt column */
export const ATTRACTION_CATEGORIES = {
  aquarium_cnt: "Aquarium",
  zoo_cnt: "Zoo",
  korean_restaurant_cnt: "Korean Restaurant",
} as const;

const CityAttractionsRowSchema = z
  .object({
    geo_id: z.string(),
    geo_name: z.string(),
    aquarium_cnt: NumericColumn,
    zoo_cnt: NumericColumn,
    korean_restaurant_cnt: NumericColumn,
  })
  .transform(
    (r): CityAttractions => ({
      geoId: r.geo_id,
      cityName: r.geo_name,
      aquariumCnt: r.aquarium_cnt,
      zooCnt: r.zoo_cnt,
      koreanRestaurantCnt: r.korean_restaurant_cnt,
    })
  );

export function buildCityAttractionsSql(t: SourceTables): string {
  const counts = Object.entries(ATTRACTION_CATEGORIES)
    .map(([column, category]) => `COUNT(CASE WHEN poi.category_main = '${category}' THEN 1 END) AS ${column}`)
    .join(",\n      ");
  const categoryList = Object.values(ATTRACTION_CATEGORIES)
    .map((c) => `'${c}'`)
    .join(", ");

  return `
    WITH major_us_cities AS (${majorUsCitiesCte(t)}
    )
    SELECT
      city.geo_id,
      city.geo_name,
      ${counts}
    FROM ${t.poiIndex} poi
    JOIN ${t.poiAddressRelationships} poi_add ON poi_add.poi_id = poi.poi_id
    JOIN ${t.usAddresses} address ON address.address_id = poi_add.address_id
    JOIN major_us_cities city ON city.geo_id = address.id_city
    WHERE poi.category_main IN (${categoryList})
      AND address.id_country = 'country/USA'
    GROUP BY city.geo_id, city.geo_name
  `;
}

export async function fetchCityAttractions(tables: SourceTables): Promise<CityAttractions[]> {
  const result = await executeQuery(buildCityAttractionsSql(tables), CityAttractionsRowSchema, {
    label: "city attractions",
  });
  return result.rows;
}
