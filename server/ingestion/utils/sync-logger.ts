/**
 * Sync Logger
 *
 * Tracks one ingestion job from start to finish: state transitions, record
 * counters, and the outcome of every resource it touched. endSync() turns the
 * context into a SyncLog, which is also the job report written by the CLI.
 */

export type JobState = "NotStarted" | "EnsuringSchema" | "Resolving" | "Loading" | "Completed" | "Failed";

export type ResourceStatus = "success" | "skipped" | "failed";

export interface ResourceResult {
  key: string;
  status: ResourceStatus;
  rowsWritten: number;
  matchId?: number;
  reason?: string;
}

export interface SyncContext {
  workerName: string;
  startTime: Date;
  state: JobState;
  recordsProcessed: number;
  recordsInserted: number;
  recordsSkipped: number;
  errors: string[];
  resources: ResourceResult[];
}

export interface SyncLog {
  workerName: string;
  source: string;
  state: JobState;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  recordsProcessed: number;
  recordsInserted: number;
  recordsSkipped: number;
  resourcesSucceeded: number;
  resourcesSkipped: number;
  resourcesFailed: number;
  errors: string[];
  resources: ResourceResult[];
}

class SyncLogger {
  startSync(workerName: string): SyncContext {
    console.log(`[${workerName}] Sync started`);
    return {
      workerName,
      startTime: new Date(),
      state: "NotStarted",
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsSkipped: 0,
      errors: [],
      resources: [],
    };
  }

  transition(context: SyncContext, state: JobState) {
    console.log(`[${context.workerName}] ${context.state} -> ${state}`);
    context.state = state;
  }

  recordResource(context: SyncContext, result: ResourceResult) {
    context.resources.push(result);
    if (result.status === "failed") {
      const subject = result.matchId !== undefined ? `Match ${result.matchId}` : result.key;
      context.errors.push(`${subject}: ${result.reason ?? "unknown error"}`);
    }
  }

  endSync(context: SyncContext, source: string): SyncLog {
    const finishedAt = new Date();
    const count = (status: ResourceStatus) => context.resources.filter((r) => r.status === status).length;

    const log: SyncLog = {
      workerName: context.workerName,
      source,
      state: context.state,
      startedAt: context.startTime.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - context.startTime.getTime(),
      recordsProcessed: context.recordsProcessed,
      recordsInserted: context.recordsInserted,
      recordsSkipped: context.recordsSkipped,
      resourcesSucceeded: count("success"),
      resourcesSkipped: count("skipped"),
      resourcesFailed: count("failed"),
      errors: context.errors,
      resources: context.resources,
    };

    console.log(
      `[${context.workerName}] Sync finished (${log.state}) in ${log.durationMs}ms from ${source}: ` +
      `${log.recordsProcessed} processed, ${log.recordsInserted} inserted, ${log.recordsSkipped} skipped, ` +
      `${log.resourcesFailed} failed resources`
    );
    return log;
  }
}

export const syncLogger = new SyncLogger();

/**
 * Resources a follow-up run should retry.
 */
export function failedResources(log: Pick<SyncLog, "resources">): ResourceResult[] {
  return log.resources.filter((r) => r.status === "failed");
}
