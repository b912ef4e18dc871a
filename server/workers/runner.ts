/**
 * Job runner
 *
 * Executes one ingestion job by name, or all four in dependency order
 * (competitions -> matches -> lineups -> events) sharing one resolver cache.
 */

import { z } from "zod";
import { syncCompetitions } from "./competitions-sync";
import { syncMatches } from "./matches-sync";
import { syncLineups } from "./lineups-sync";
import { syncEvents } from "./events-sync";
import { ResolverCache } from "../ingestion/resolver";
import type { IngestDeps, MatchJobOptions, SyncResult } from "./deps";

export const JOB_TYPES = ["competitions", "matches", "lineups", "events"] as const;

export const jobTypeSchema = z.enum(JOB_TYPES);
export type JobType = z.infer<typeof jobTypeSchema>;

export const JOB_SELECTIONS = [...JOB_TYPES, "all"] as const;
export const jobSelectionSchema = z.enum(JOB_SELECTIONS);
export type JobSelection = z.infer<typeof jobSelectionSchema>;

export interface JobRun {
  success: boolean;
  job: JobType;
  duration: number;
  result: SyncResult;
}

export async function executeJob(
  job: JobType,
  deps: IngestDeps,
  options: MatchJobOptions = {}
): Promise<JobRun> {
  const startTime = Date.now();
  console.log(`[runner] Executing job: ${job}`);

  let result: SyncResult;
  switch (job) {
    case "competitions":
      result = await syncCompetitions(deps);
      break;
    case "matches":
      result = await syncMatches(deps);
      break;
    case "lineups":
      result = await syncLineups(deps, options);
      break;
    case "events":
      result = await syncEvents(deps, options);
      break;
    default: {
      const unknownJob: never = job;
      throw new Error(`Unknown job: ${String(unknownJob)}`);
    }
  }

  const duration = Date.now() - startTime;
  console.log(`[runner] Job ${job} ${result.success ? "completed" : "failed"} in ${duration}ms:`, {
    recordsProcessed: result.log.recordsProcessed,
    recordsInserted: result.log.recordsInserted,
    recordsSkipped: result.log.recordsSkipped,
    resourcesFailed: result.log.resourcesFailed,
  });

  return { success: result.success, job, duration, result };
}

/**
 * Runs every job in order. Later jobs still run when an earlier one fails,
 * since they resolve from the object store, not from the database.
 */
export async function executeAllJobs(deps: IngestDeps): Promise<JobRun[]> {
  const shared: IngestDeps = { ...deps, cache: deps.cache ?? new ResolverCache() };
  const runs: JobRun[] = [];
  for (const job of JOB_TYPES) {
    runs.push(await executeJob(job, shared));
  }
  return runs;
}
