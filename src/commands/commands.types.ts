import type { PublishLocation, PublishTarget } from "#/publish";
import type { RepoInfo } from "#/remote";
import type { SearchOutcome, SyncContext, SyncOutcome } from "#/sync";

export const COMMAND_NAMES = ["put", "remove", "copy", "search", "repo", "publish"] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

/**
 * Arguments as they come from the command line
 */
export interface CommandArgs {
  positionals: string[];
  /** Piped input; put, remove and copy read their entries from it when none are given */
  readInput?: () => Promise<string>;
  forceReplace?: boolean;
  move?: boolean;
  dryRun?: boolean;
  queries?: string[];
  byName?: boolean;
  dirRefs?: boolean;
  /** Rotation count for search */
  rotate?: number;
  detail?: boolean;
  force?: boolean;
  comment?: string;
  distribution?: string;
  component?: string;
  sourceKind?: string;
  /** Comma-separated */
  architectures?: string;
  label?: string;
  origin?: string;
}

export type CommandResult =
  | { kind: "sync"; outcome: SyncOutcome }
  | { kind: "search"; outcome: SearchOutcome; rotated: boolean; dirRefs: boolean }
  | { kind: "repos"; repos: RepoInfo[]; detail: boolean }
  | { kind: "repo"; action: "created" | "edited"; repo: RepoInfo }
  | { kind: "repo"; action: "deleted"; name: string }
  | { kind: "publishes"; publishes: PublishTarget[]; detail: boolean }
  | { kind: "publish"; action: "created"; publish: PublishTarget }
  | { kind: "publish"; action: "updated" | "dropped"; publish: PublishLocation };

export interface Command {
  name: CommandName;
  description: string;
  /** Argument synopsis shown in help and usage errors */
  usage: string;
  run(deps: SyncContext, args: CommandArgs): Promise<CommandResult>;
}
