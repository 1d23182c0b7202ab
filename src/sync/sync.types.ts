/**
 * Sync module types
 *
 * Inputs and results of the put / remove / copy workflows and of search.
 */

import type { EventSink, FileSystem } from "#/core";
import type { ErrorKind } from "#/errors";
import type { PackageRef } from "#/packageRef";
import type { PublishTarget } from "#/publish";
import type { RemoteService } from "#/remote";
import type { SigningProfile } from "#/signing";

export type SyncCommand = "put" | "remove" | "copy";

export type SyncState = "staging" | "mutating" | "resolving" | "refreshing" | "done" | "failed";

export type PackageAction = "added" | "removed" | "copied";

export type OutcomeItem =
  | { type: "package"; action: PackageAction; ref: PackageRef }
  | { type: "publish"; target: PublishTarget };

export interface OutcomeFailure {
  /** Artifact path, repo/key reference, publish key or other label */
  item: string;
  kind: ErrorKind;
  message: string;
}

/**
 * - success: nothing failed
 * - partial-failure: something failed but at least one mutation went through
 * - failure: no mutation went through
 */
export type SyncStatus = "success" | "partial-failure" | "failure";

export interface SyncOutcome {
  command: SyncCommand;
  status: SyncStatus;
  /** Nothing was changed; `succeeded` lists what would have been */
  dryRun: boolean;
  succeeded: OutcomeItem[];
  failed: OutcomeFailure[];
}

/**
 * Everything the orchestrator talks to
 */
export interface SyncContext {
  remote: RemoteService;
  events: EventSink;
  fs: FileSystem;
  /** Signing setup of the active profile */
  signing: SigningProfile;
  /** Parallel remote calls per stage (default 4) */
  concurrency?: number;
  /** Milliseconds since the epoch, used to name upload directories */
  now?: () => number;
}

export interface PutInput {
  repo: string;
  /** Local paths of package files */
  artifacts: string[];
  forceReplace?: boolean;
}

export interface RemoveInput {
  /** References with their repo set; may span several repos */
  refs: PackageRef[];
  /** Resolve dependent publishes but change nothing */
  dryRun?: boolean;
}

export interface CopyInput {
  from: string;
  to: string;
  refs: PackageRef[];
  /** Remove from `from` after a successful copy */
  move?: boolean;
  dryRun?: boolean;
}

export interface SearchInput {
  /** Repos to search; every local repo of the service when empty */
  repos: string[];
  /** aptly package queries, run one after another; none lists everything */
  queries?: string[];
  /** Treat each query as a regular expression on the package name */
  byName?: boolean;
  /** Rotation count; no rotation when unset */
  keep?: number;
}

export interface SearchOutcome {
  /** Repos searched, in search order */
  repos: string[];
  /** Every package found, grouped by query, then by repo */
  packages: PackageRef[];
  retained: PackageRef[];
  surplus: PackageRef[];
  failed: OutcomeFailure[];
}
