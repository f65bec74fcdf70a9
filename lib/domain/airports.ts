/**
 * Airport → city lookup.
 *
 * Built once per run from a static JSON list. Two entry shapes are accepted:
 *   - records: { "code": "LAX", "name": "Los Angeles", ... }   (name = city)
 *   - pyairports tuples: ["Los Angeles Intl", "Los Angeles", "United States", "LAX", ...]
 *
 * Entries without a usable IATA code or city are skipped. When a code is
 * listed twice, the later entry wins.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

const IATA_RE = /^[A-Za-z]{3}$/;

const AirportRecordSchema = z
  .object({
    code: z.string().trim().regex(IATA_RE),
    name: z.string().trim().min(1),
  })
  .transform((r) => ({ code: r.code.toUpperCase(), city: r.name }));

const AirportTupleSchema = z
  .tuple(
    [z.string(), z.string().trim().min(1), z.string(), z.string().trim().regex(IATA_RE)],
    z.unknown()
  )
  .transform((t) => ({ code: t[3].toUpperCase(), city: t[1] }));

const AirportEntrySchema = z.union([AirportRecordSchema, AirportTupleSchema]);

export class AirportLookup {
  private readonly cities: Map<string, string>;

  constructor(entries: Array<{ code: string; city: string }>) {
    this.cities = new Map();
    for (const { code, city } of entries) {
      this.cities.set(code, city);
    }
  }

  /** City served by an airport, or null for unknown codes. */
  cityFor(iata: string): string | null {
    return this.cities.get(iata.trim().toUpperCase()) ?? null;
  }

  get size(): number {
    return this.cities.size;
  }
}

export interface ParsedAirportList {
  lookup: AirportLookup;
  /** Entries dropped for a missing code or city */
  skipped: number;
}

export function parseAirportList(raw: unknown): ParsedAirportList {
  if (!Array.isArray(raw)) {
    throw new Error("Airport list must be a JSON array");
  }
  const entries: Array<{ code: string; city: string }> = [];
  let skipped = 0;
  for (const item of raw) {
    const result = AirportEntrySchema.safeParse(item);
    if (result.success) entries.push(result.data);
    else skipped++;
  }
  return { lookup: new AirportLookup(entries), skipped };
}

export async function loadAirportLookup(path: string): Promise<AirportLookup> {
  const text = await readFile(path, "utf-8");
  const { lookup, skipped } = parseAirportList(JSON.parse(text));
  console.log(`[airports] loaded ${lookup.size} airport codes from ${path} (${skipped} entries skipped)`);
  return lookup;
}
