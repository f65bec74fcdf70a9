import { z } from "zod";
import { executeQuery } from "@/lib/warehouse/sql-client";
import { NumericColumn, validateIataCode } from "@/lib/validation";
import type { FlightEmission } from "@/lib/domain/types";
import type { SourceTables } from "./sources";

const EmissionRowSchema = z
  .object({
    departure_airport: z.string(),
    arrival_airport: z.string(),
    co2_emissions_kg_per_person: NumericColumn,
  })
  .transform(
    (r): FlightEmission => ({
      departureAirport: r.departure_airport,
      arrivalAirport: r.arrival_airport,
      co2EmissionsKgPerPerson: r.co2_emissions_kg_per_person,
    })
  );

/**
 * Per-seat CO2 of every route leaving `origin`, in kg per person.
 *
 * NOTE: zero-seat and emission-less schedules are filtered before the
 * division, so the average never divides by zero.
 */
export function buildFlightEmissionsSql(origin: string, t: SourceTables): string {
  const airport = validateIataCode(origin, "origin airport");
  return `
    SELECT
      departure_airport,
      arrival_airport,
      AVG(estimated_co2_total_tonnes / seats) * 1000 AS co2_emissions_kg_per_person
    FROM ${t.emissions}
    WHERE seats != 0
      AND estimated_co2_total_tonnes IS NOT NULL
      AND departure_airport = '${airport}'
    GROUP BY departure_airport, arrival_airport
  `;
}

export async function fetchFlightEmissions(
  origin: string,
  tables: SourceTables
): Promise<FlightEmission[]> {
  const result = await executeQuery(buildFlightEmissionsSql(origin, tables), EmissionRowSchema, {
    label: "flight emissions",
  });
  return result.rows;
}
