import { describe, it, expect, vi } from "vitest";
import { runMergeJob } from "../merge-job";
import { runRecommendationJob } from "../recommendation-job";
import { AirportLookup } from "@/lib/domain/airports";
import type { PayloadRecord } from "@/lib/domain/payload";
import { DEFAULT_POLICY } from "@/lib/domain/policy";
import type { SourceSnapshot } from "@/lib/domain/types";
import type { Notification } from "@/lib/notify/sink";
import { InMemoryVacationSpotsStore } from "./fakes";

const SOURCES: SourceSnapshot = {
  emissions: [
    { departureAirport: "LAX", arrivalAirport: "HNL", co2EmissionsKgPerPerson: 300 },
    { departureAirport: "LAX", arrivalAirport: "MIA", co2EmissionsKgPerPerson: 250 },
  ],
  punctuality: [
    { departureAirport: "LAX", arrivalAirport: "HNL", punctualPct: 80 },
    { departureAirport: "LAX", arrivalAirport: "MIA", punctualPct: 49 },
  ],
  weather: [
    {
      geoId: "geo/hnl",
      cityName: "Honolulu",
      totalPopulation: 350_000,
      avgTemperatureAirF: 81,
      avgRelativeHumidityPct: 60,
      avgCloudCoverPct: 30,
      precipitationProbabilityPct: 10,
    },
    {
      geoId: "geo/mia",
      cityName: "Miami",
      totalPopulation: 450_000,
      avgTemperatureAirF: 85,
      avgRelativeHumidityPct: 70,
      avgCloudCoverPct: 35,
      precipitationProbabilityPct: 20,
    },
  ],
  attractions: [
    { geoId: "geo/hnl", cityName: "Honolulu", aquariumCnt: 1, zooCnt: 1, koreanRestaurantCnt: 9 },
    { geoId: "geo/mia", cityName: "Miami", aquariumCnt: 1, zooCnt: 1, koreanRestaurantCnt: 4 },
  ],
};

describe("merge then recommend", () => {
  it("carries a qualifying source destination into the payload and the prompt", async () => {
    const store = new InMemoryVacationSpotsStore();
    const generate = vi.fn(async (_model: string, _prompt: string) => "Day 1: Waikiki beach.");
    const send = vi.fn(async (_notification: Notification) => {});

    const merge = await runMergeJob({
      extract: async () => SOURCES,
      store,
      airports: new AirportLookup([
        { code: "HNL", city: "Honolulu" },
        { code: "MIA", city: "Miami" },
      ]),
      origin: "LAX",
      retentionDays: 1,
      now: () => new Date("2026-06-01T06:00:00Z"),
    });
    expect(merge.inserted).toBe(2);

    const result = await runRecommendationJob({
      store,
      generator: { generate },
      sink: { send },
      recipient: "traveller@example.com",
      model: "test-model",
      timeoutMs: 50,
      policy: DEFAULT_POLICY,
      limit: 10,
      generation: { initialDelayMs: 0, log: vi.fn() },
      notifyRetry: { initialDelayMs: 0 },
    });

    expect(result.state).toBe("NOTIFIED_SUCCESS");
    expect(result).toMatchObject({ stored: 2, matched: 1, selected: 1 });

    const payload: PayloadRecord[] = JSON.parse(result.payload);
    expect(payload.map((r) => [r.city, r.airport])).toEqual([["Honolulu", "HNL"]]);
    expect(payload[0]).toMatchObject({ punctual_pct: 80, avg_temperature_air_f: 81, korean_restaurant_cnt: 9 });

    expect(generate).toHaveBeenCalledTimes(1);
    const prompt = generate.mock.calls[0][1];
    expect(prompt.endsWith(result.payload)).toBe(true);
    expect(prompt).toContain('"city":"Honolulu","airport":"HNL"');
    expect(prompt).not.toContain('"airport":"MIA"');
    expect(send).toHaveBeenCalledTimes(1);
  });
});
