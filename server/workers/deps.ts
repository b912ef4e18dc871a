import type { ObjectStore } from "../ingestion/sources/object-store";
import type { ResourceKeys } from "../ingestion/sources/resource-keys";
import type { IngestStore } from "../ingestion/loader";
import type { ResolverCache } from "../ingestion/resolver";
import type { SyncLog } from "../ingestion/utils/sync-logger";

/**
 * Collaborators shared by every ingestion job.
 */
export interface IngestDeps {
  objects: ObjectStore;
  keys: ResourceKeys;
  store: IngestStore;
  /** Worker width for the events job */
  concurrency: number;
  cache?: ResolverCache;
}

/**
 * Restricts a match-level job to part of the dataset, for a retry of a
 * previous report. A match is kept when its id is in `onlyMatchIds` or its
 * match list key is in `onlyMatchLists`.
 */
export interface MatchJobOptions {
  onlyMatchIds?: ReadonlySet<number>;
  onlyMatchLists?: ReadonlySet<string>;
}

export type SyncResult =
  | { success: true; log: SyncLog }
  | { success: false; log: SyncLog; error: string };
