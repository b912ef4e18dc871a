import "dotenv/config";
import fs from "fs";
import {
  parseIngestArgs,
  retryTargetsFromReport,
  UsageError,
  USAGE,
  type IngestArgs,
  type IngestReport,
  type RetryTargets,
} from "../server/_core/cli";
import { loadIngestConfig } from "../server/_core/env";
import { createPool, verifyConnection } from "../server/db";
import { PostgresLoader } from "../server/ingestion/loader";
import { createObjectStore } from "../server/ingestion/sources/object-store";
import { createResourceKeys } from "../server/ingestion/sources/resource-keys";
import { executeAllJobs, executeJob, type JobRun } from "../server/workers/runner";

async function main(): Promise<number> {
  let args: IngestArgs;
  try {
    args = parseIngestArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  let retry: RetryTargets | undefined;
  if (args.retryFailedPath) {
    const previous: unknown = JSON.parse(fs.readFileSync(args.retryFailedPath, "utf-8"));
    retry = retryTargetsFromReport(previous, args.type);
    console.log(
      `[ingest] Retrying ${retry.onlyMatchIds.size} failed matches and ${retry.onlyMatchLists.size} failed match lists from ${args.retryFailedPath}`
    );
    if (retry.onlyMatchIds.size === 0 && retry.onlyMatchLists.size === 0) return 0;
  }

  const config = await loadIngestConfig();
  const pool = createPool(config.databaseUrl, config.concurrency);

  try {
    await verifyConnection(pool);

    const deps = {
      objects: createObjectStore(config),
      keys: createResourceKeys(config.prefix),
      store: PostgresLoader.fromPool(pool, { lineupsUnique: config.lineupsUnique }),
      concurrency: config.concurrency,
    };

    const runs: JobRun[] = args.type === "all"
      ? await executeAllJobs(deps)
      : [await executeJob(args.type, deps, retry)];

    if (args.reportPath) {
      const report: IngestReport = { generatedAt: new Date().toISOString(), runs };
      fs.writeFileSync(args.reportPath, JSON.stringify(report, null, 2));
      console.log(`[ingest] Report written to ${args.reportPath}`);
    }

    return runs.every((run) => run.success) ? 0 : 1;
  } finally {
    await pool.end();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    console.error("[ingest] Fatal error:", error);
    process.exit(1);
  });
