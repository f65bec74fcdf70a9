import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { HomeConfig } from "@/lib/domain/types";

const IATA_RE = /^[A-Za-z]{3}$/;

const HomeConfigSchema = z.object({
  airport: z
    .string({ error: "home config needs an \"airport\" field" })
    .trim()
    .regex(IATA_RE, "airport must be a three-letter IATA code")
    .transform((v) => v.toUpperCase()),
});

export function parseHomeConfig(raw: unknown): HomeConfig {
  const result = HomeConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((i) => i.message).join(", ");
    throw new Error(`Invalid home config: ${messages}`);
  }
  return result.data;
}

/** Read the origin airport from a `{ "airport": "<IATA>" }` file. */
export async function loadHomeConfig(path: string): Promise<HomeConfig> {
  const text = await readFile(path, "utf-8");
  return parseHomeConfig(JSON.parse(text));
}
