/**
 * Merge-and-Store job.
 *
 *   extract (one warehouse session) → harmonize → dedupe → upsert → purge
 *
 * The upsert only rewrites rows whose metrics changed, so running the job
 * twice over unchanged sources leaves the table as it was. Destinations
 * that drop out of the source are purged `retentionDays` after the first
 * run that missed them.
 */

import { subDays } from "date-fns";
import type { AirportLookup } from "@/lib/domain/airports";
import { dedupeDestinations, harmonize, type HarmonizeStats } from "@/lib/domain/harmonize";
import type { SourceSnapshot } from "@/lib/domain/types";
import type { VacationSpotsStore } from "@/lib/store/vacation-spots-store";
import { logError } from "@/lib/errors";
import { TIMEOUTS, withTimeout } from "@/lib/warehouse/timeout";

export interface MergeJobDeps {
  extract: (origin: string) => Promise<SourceSnapshot>;
  store: VacationSpotsStore;
  airports: AirportLookup;
  origin: string;
  /** Days a row that left the source is kept before it is purged */
  retentionDays: number;
  /** Bound on the whole extraction; defaults to TIMEOUTS.SQL_QUERY */
  extractTimeoutMs?: number;
  now?: () => Date;
}

export interface MergeResult {
  origin: string;
  sources: {
    emissions: number;
    punctuality: number;
    weather: number;
    attractions: number;
  };
  harmonized: number;
  /** Harmonized rows collapsed into an earlier row with the same key */
  duplicates: number;
  inserted: number;
  updated: number;
  unchanged: number;
  /** Rows first found absent from the source on this run */
  missing: number;
  purged: number;
  stats: HarmonizeStats;
  durationMs: number;
}

export async function runMergeJob(deps: MergeJobDeps): Promise<MergeResult> {
  const { store, airports, origin, retentionDays } = deps;
  const now = deps.now ?? (() => new Date());
  const start = Date.now();

  try {
    const sources = await withTimeout(() => deps.extract(origin), {
      timeoutMs: deps.extractTimeoutMs ?? TIMEOUTS.SQL_QUERY,
      label: `extract(${origin})`,
    });
    const { rows, stats } = harmonize(sources, origin, airports);
    const unique = dedupeDestinations(rows);

    if (stats.unmappedAirports.length > 0) {
      console.log(`[merge-job] no city for ${stats.unmappedAirports.length} airports: ${stats.unmappedAirports.join(", ")}`);
    }

    const runAt = now();
    const counts = await store.upsert(unique, runAt);

    let retired = { missing: 0, purged: 0 };
    if (unique.length === 0) {
      console.warn("[merge-job] harmonized set is empty, skipping purge");
    } else {
      retired = await store.purgeStale(
        unique.map((r) => ({ city: r.city, airport: r.airport })),
        runAt,
        subDays(runAt, retentionDays)
      );
    }

    const result: MergeResult = {
      origin,
      sources: {
        emissions: sources.emissions.length,
        punctuality: sources.punctuality.length,
        weather: sources.weather.length,
        attractions: sources.attractions.length,
      },
      harmonized: rows.length,
      duplicates: rows.length - unique.length,
      ...counts,
      ...retired,
      stats,
      durationMs: Date.now() - start,
    };

    console.log(
      `[merge-job] ${origin}: ${result.harmonized} harmonized (${result.duplicates} duplicate keys), ` +
        `${result.inserted} inserted, ${result.updated} updated, ${result.unchanged} unchanged, ` +
        `${result.missing} newly missing, ${result.purged} purged in ${result.durationMs}ms`
    );
    return result;
  } catch (err: unknown) {
    logError("merge-job", err);
    throw err;
  }
}
