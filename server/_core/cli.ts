import { z } from "zod";
import { jobSelectionSchema, JOB_SELECTIONS, type JobSelection, type JobRun } from "../workers/runner";
import { failedResources } from "../ingestion/utils/sync-logger";

export interface IngestArgs {
  type: JobSelection;
  reportPath: string | null;
  retryFailedPath: string | null;
  help: boolean;
}

export const USAGE = `Usage: ingest [--type ${JOB_SELECTIONS.join("|")}] [--report <file>] [--retry-failed <file>]

  --type          job to run (default: competitions)
  --report        write the job report as JSON to <file>
  --retry-failed  only retry the matches and match lists that failed in a previous report (lineups, events)`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parses process.argv.slice(2). Rejects unknown flags and job types before
 * anything touches the network or the database.
 */
export function parseIngestArgs(argv: readonly string[]): IngestArgs {
  const args: IngestArgs = { type: "competitions", reportPath: null, retryFailedPath: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case "--type": {
        const raw = value();
        const parsed = jobSelectionSchema.safeParse(raw);
        if (!parsed.success) {
          throw new UsageError(`Unknown job type "${raw}". Expected one of: ${JOB_SELECTIONS.join(", ")}`);
        }
        args.type = parsed.data;
        break;
      }
      case "--report":
        args.reportPath = value();
        break;
      case "--retry-failed":
        args.retryFailedPath = value();
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (args.retryFailedPath && args.type !== "lineups" && args.type !== "events") {
    throw new UsageError("--retry-failed only applies to --type lineups or --type events");
  }
  return args;
}

const reportSchema = z.object({
  runs: z.array(
    z.object({
      job: z.string(),
      result: z.object({
        log: z.object({
          resources: z.array(
            z.object({
              key: z.string(),
              status: z.enum(["success", "skipped", "failed"]),
              rowsWritten: z.number(),
              matchId: z.number().optional(),
              reason: z.string().optional(),
            })
          ),
        }),
      }),
    })
  ),
});

export interface IngestReport {
  generatedAt: string;
  runs: JobRun[];
}

export interface RetryTargets {
  onlyMatchIds: Set<number>;
  onlyMatchLists: Set<string>;
}

/**
 * What failed for `job` in a report written by --report: matches whose own
 * resource failed, and match lists that could not be fetched.
 */
export function retryTargetsFromReport(report: unknown, job: JobSelection): RetryTargets {
  const parsed = reportSchema.safeParse(report);
  if (!parsed.success) {
    throw new UsageError(`Not an ingestion report: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }
  const targets: RetryTargets = { onlyMatchIds: new Set(), onlyMatchLists: new Set() };
  for (const run of parsed.data.runs) {
    if (run.job !== job) continue;
    for (const resource of failedResources(run.result.log)) {
      if (resource.matchId !== undefined) {
        targets.onlyMatchIds.add(resource.matchId);
      } else {
        targets.onlyMatchLists.add(resource.key);
      }
    }
  }
  return targets;
}
