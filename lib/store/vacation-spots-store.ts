/**
 * Vacation Spots: Postgres persistence of harmonized destinations.
 *
 * One row per (city, airport) in <schema>.vacation_spots. Each refresh
 * upserts the harmonized rows in a single transaction:
 *
 *   - new key            → inserted
 *   - key, new metrics   → all metric columns updated, updated_at bumped
 *   - key, same metrics  → untouched (so reruns leave the table unchanged)
 *   - key back in source → missing_since cleared
 *
 * A row that leaves the source gets missing_since stamped on the first run
 * it is absent, and is purged once that stamp is older than the retention
 * window. missing_since is not a metric: it never bumps updated_at.
 */

import { z } from "zod";
import { dedupeDestinations } from "@/lib/domain/harmonize";
import type {
  CandidateDestination,
  DestinationKey,
  VacationSpot,
} from "@/lib/domain/types";
import { NullableNumericColumn, NumericColumn, parseRows, validateIdentifier } from "@/lib/validation";
import type { TransactionalExecutor } from "./database";

export interface UpsertResult {
  inserted: number;
  /** Metrics changed, or the row came back after going missing */
  updated: number;
  unchanged: number;
}

export interface PurgeResult {
  /** Rows stamped missing on this run */
  missing: number;
  purged: number;
}

export interface VacationSpotsStore {
  ensureSchema(): Promise<void>;
  /** Upsert keyed by (city, airport); for a repeated key the last row wins. */
  upsert(rows: CandidateDestination[], now: Date): Promise<UpsertResult>;
  /**
   * Stamp rows not in `keep` as missing since `now`, then delete rows that
   * have been missing since `cutoff` or earlier.
   */
  purgeStale(keep: DestinationKey[], now: Date, cutoff: Date): Promise<PurgeResult>;
  listAll(): Promise<VacationSpot[]>;
}

/** Metric columns in table order, paired with their Postgres array type for unnest() */
const METRIC_COLUMNS = [
  { column: "co2_emissions_kg_per_person", type: "float8", pick: (r: CandidateDestination) => r.co2EmissionsKgPerPerson },
  { column: "punctual_pct", type: "float8", pick: (r: CandidateDestination) => r.punctualPct },
  { column: "avg_temperature_air_f", type: "float8", pick: (r: CandidateDestination) => r.avgTemperatureAirF },
  { column: "avg_relative_humidity_pct", type: "float8", pick: (r: CandidateDestination) => r.avgRelativeHumidityPct },
  { column: "avg_cloud_cover_pct", type: "float8", pick: (r: CandidateDestination) => r.avgCloudCoverPct },
  { column: "precipitation_probability_pct", type: "float8", pick: (r: CandidateDestination) => r.precipitationProbabilityPct },
  { column: "aquarium_cnt", type: "int4", pick: (r: CandidateDestination) => r.aquariumCnt },
  { column: "zoo_cnt", type: "int4", pick: (r: CandidateDestination) => r.zooCnt },
  { column: "korean_restaurant_cnt", type: "int4", pick: (r: CandidateDestination) => r.koreanRestaurantCnt },
] as const;

const METRIC_NAMES = METRIC_COLUMNS.map((m) => m.column);

const VacationSpotRowSchema = z
  .object({
    city: z.string(),
    airport: z.string(),
    co2_emissions_kg_per_person: NumericColumn,
    punctual_pct: NumericColumn,
    avg_temperature_air_f: NullableNumericColumn,
    avg_relative_humidity_pct: NullableNumericColumn,
    avg_cloud_cover_pct: NullableNumericColumn,
    precipitation_probability_pct: NullableNumericColumn,
    aquarium_cnt: NumericColumn,
    zoo_cnt: NumericColumn,
    korean_restaurant_cnt: NumericColumn,
    updated_at: z.coerce.date(),
  })
  .transform(
    (r): VacationSpot => ({
      city: r.city,
      airport: r.airport,
      co2EmissionsKgPerPerson: r.co2_emissions_kg_per_person,
      punctualPct: r.punctual_pct,
      avgTemperatureAirF: r.avg_temperature_air_f,
      avgRelativeHumidityPct: r.avg_relative_humidity_pct,
      avgCloudCoverPct: r.avg_cloud_cover_pct,
      precipitationProbabilityPct: r.precipitation_probability_pct,
      aquariumCnt: r.aquarium_cnt,
      zooCnt: r.zoo_cnt,
      koreanRestaurantCnt: r.korean_restaurant_cnt,
      updatedAt: r.updated_at,
    })
  );

const InsertedFlagSchema = z.object({ inserted: z.boolean() });

export class PgVacationSpotsStore implements VacationSpotsStore {
  private readonly schema: string;
  private readonly table: string;

  constructor(
    private readonly db: TransactionalExecutor,
    schema: string
  ) {
    this.schema = validateIdentifier(schema, "target schema");
    this.table = `${this.schema}.vacation_spots`;
  }

  async ensureSchema(): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.query(`CREATE SCHEMA IF NOT EXISTS ${this.schema}`);
      await tx.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          city text NOT NULL,
          airport text NOT NULL,
          co2_emissions_kg_per_person double precision,
          punctual_pct double precision,
          avg_temperature_air_f double precision,
          avg_relative_humidity_pct double precision,
          avg_cloud_cover_pct double precision,
          precipitation_probability_pct double precision,
          updated_at timestamptz NOT NULL DEFAULT now(),
          PRIMARY KEY (city, airport)
        )
      `);
      // attraction metrics were added after the first release of the table
      for (const column of ["aquarium_cnt", "zoo_cnt", "korean_restaurant_cnt"]) {
        await tx.query(`ALTER TABLE ${this.table} ADD COLUMN IF NOT EXISTS ${column} integer NOT NULL DEFAULT 0`);
      }
      await tx.query(`ALTER TABLE ${this.table} ADD COLUMN IF NOT EXISTS missing_since timestamptz`);
    });
    console.log(`[vacation-spots-store] schema ensured for ${this.table}`);
  }

  async upsert(input: CandidateDestination[], now: Date): Promise<UpsertResult> {
    // ON CONFLICT cannot touch the same key twice in one statement
    const rows = dedupeDestinations(input);
    if (rows.length === 0) return { inserted: 0, updated: 0, unchanged: 0 };

    const columns = ["city", "airport", ...METRIC_NAMES];
    const unnestArgs = [
      "$1::text[]",
      "$2::text[]",
      ...METRIC_COLUMNS.map((m, i) => `$${i + 3}::${m.type}[]`),
    ];
    const nowParam = `$${METRIC_COLUMNS.length + 3}`;
    const updates = METRIC_NAMES.map((c) => `${c} = EXCLUDED.${c}`);
    const metricsChanged =
      `(${METRIC_NAMES.map((c) => `t.${c}`).join(", ")}) ` +
      `IS DISTINCT FROM (${METRIC_NAMES.map((c) => `EXCLUDED.${c}`).join(", ")})`;

    // xmax = 0 only for freshly inserted tuples; unchanged rows are filtered
    // by the WHERE clause and return nothing.
    const sql = `
      INSERT INTO ${this.table} AS t (${columns.join(", ")}, updated_at)
      SELECT src.*, ${nowParam}::timestamptz
      FROM unnest(${unnestArgs.join(", ")}) AS src(${columns.join(", ")})
      ON CONFLICT (city, airport) DO UPDATE SET
        ${updates.join(",\n        ")},
        updated_at = CASE WHEN ${metricsChanged} THEN EXCLUDED.updated_at ELSE t.updated_at END,
        missing_since = NULL
      WHERE ${metricsChanged}
        OR t.missing_since IS NOT NULL
      RETURNING (xmax = 0) AS inserted
    `;

    const values: unknown[] = [
      rows.map((r) => r.city),
      rows.map((r) => r.airport),
      ...METRIC_COLUMNS.map((m) => rows.map((r) => m.pick(r))),
      now,
    ];

    const result = await this.db.transaction((tx) => tx.query(sql, values));
    const flags = parseRows(result.rows, InsertedFlagSchema, "upsert returning");
    const inserted = flags.filter((f) => f.inserted).length;
    const updated = flags.length - inserted;

    return { inserted, updated, unchanged: rows.length - flags.length };
  }

  async purgeStale(keep: DestinationKey[], now: Date, cutoff: Date): Promise<PurgeResult> {
    return this.db.transaction(async (tx) => {
      const marked = await tx.query(
        `UPDATE ${this.table} SET missing_since = $1
         WHERE missing_since IS NULL
           AND (city, airport) NOT IN (
             SELECT k.city, k.airport FROM unnest($2::text[], $3::text[]) AS k(city, airport)
           )`,
        [now, keep.map((k) => k.city), keep.map((k) => k.airport)]
      );
      const deleted = await tx.query(
        `DELETE FROM ${this.table} WHERE missing_since <= $1`,
        [cutoff]
      );
      return { missing: marked.rowCount ?? 0, purged: deleted.rowCount ?? 0 };
    });
  }

  async listAll(): Promise<VacationSpot[]> {
    const result = await this.db.query(
      `SELECT city, airport, ${METRIC_NAMES.join(", ")}, updated_at
       FROM ${this.table}
       ORDER BY city, airport`
    );
    return parseRows(result.rows, VacationSpotRowSchema, "vacation_spots");
  }
}
