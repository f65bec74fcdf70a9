import { z } from "zod";
import { executeQuery } from "@/lib/warehouse/sql-client";
import { NumericColumn, validateIataCode } from "@/lib/validation";
import type { FlightPunctuality } from "@/lib/domain/types";
import type { SourceTables } from "./sources";

const PunctualityRowSchema = z
  .object({
    departure_airport: z.string(),
    arrival_airport: z.string(),
    punctual_pct: NumericColumn,
  })
  .transform(
    (r): FlightPunctuality => ({
      departureAirport: r.departure_airport,
      arrivalAirport: r.arrival_airport,
      punctualPct: r.punctual_pct,
    })
  );

/**
 * Percentage of flights per route arriving early or on time at the gate.
 * Flights without a recorded ingate timeliness are ignored.
 */
export function buildFlightPunctualitySql(origin: string, t: SourceTables): string {
  const airport = validateIataCode(origin, "origin airport");
  return `
    SELECT
      departure_iata_airport_code AS departure_airport,
      arrival_iata_airport_code AS arrival_airport,
      COUNT(CASE WHEN arrival_actual_ingate_timeliness IN ('OnTime', 'Early') THEN 1 END)
        / COUNT(*) * 100 AS punctual_pct
    FROM ${t.flightStatus}
    WHERE arrival_actual_ingate_timeliness IS NOT NULL
      AND departure_iata_airport_code = '${airport}'
    GROUP BY departure_iata_airport_code, arrival_iata_airport_code
  `;
}

export async function fetchFlightPunctuality(
  origin: string,
  tables: SourceTables
): Promise<FlightPunctuality[]> {
  const result = await executeQuery(buildFlightPunctualitySql(origin, tables), PunctualityRowSchema, {
    label: "flight punctuality",
  });
  return result.rows;
}
