/**
 * Production wiring: builds the pipeline's collaborators from AppConfig.
 *
 * The airport lookup and origin config are read at the start of every run,
 * so edits to those files take effect on the next scheduled run.
 */

import { WarehouseTextGenerator } from "@/lib/ai/text-generation";
import type { AppConfig } from "@/lib/config";
import { loadAirportLookup } from "@/lib/domain/airports";
import { loadHomeConfig } from "@/lib/domain/home";
import { runMergeJob } from "@/lib/jobs/merge-job";
import { runPipeline, type PipelineRunResult } from "@/lib/jobs/pipeline";
import { runRecommendationJob } from "@/lib/jobs/recommendation-job";
import { SmtpNotificationSink } from "@/lib/notify/smtp-sink";
import { extractSources, resolveSourceTables } from "@/lib/queries";
import { closePool, PgDatabase } from "@/lib/store/database";
import { PgVacationSpotsStore } from "@/lib/store/vacation-spots-store";
import { closeSqlClient } from "@/lib/warehouse/sql-client";

export interface Runtime {
  /** Create the target schema and table if absent */
  migrate(): Promise<void>;
  runOnce(): Promise<PipelineRunResult>;
  close(): Promise<void>;
}

export function createRuntime(config: AppConfig): Runtime {
  const store = new PgVacationSpotsStore(new PgDatabase(), config.targetSchema);
  const sink = new SmtpNotificationSink(config.notify.smtpUrl, config.notify.from);
  const generator = new WarehouseTextGenerator();
  const tables = resolveSourceTables(config.sourceCatalog);

  return {
    migrate: () => store.ensureSchema(),

    runOnce: () =>
      runPipeline({
        merge: async () => {
          const [home, airports] = await Promise.all([
            loadHomeConfig(config.files.homeConfigPath),
            loadAirportLookup(config.files.airportListPath),
          ]);
          await store.ensureSchema();
          return runMergeJob({
            extract: (origin) => extractSources(origin, tables),
            store,
            airports,
            origin: home.airport,
            retentionDays: config.retentionDays,
          });
        },
        recommend: () =>
          runRecommendationJob({
            store,
            generator,
            sink,
            recipient: config.notify.recipient,
            model: config.ai.model,
            timeoutMs: config.ai.timeoutMs,
            policy: config.recommendation.policy,
            limit: config.recommendation.limit,
          }),
      }),

    close: async () => {
      sink.close();
      await Promise.all([closePool(), closeSqlClient()]);
    },
  };
}
