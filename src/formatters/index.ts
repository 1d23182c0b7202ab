import { formatDirRef, formatRepoRef, type PackageRef } from "#/packageRef";
import { publishKey, type PublishTarget } from "#/publish";
import type { RepoInfo } from "#/remote";
import type { CommandResult } from "#/commands";
import type { OutcomeFailure, OutcomeItem, PackageAction, SearchOutcome, SyncCommand, SyncOutcome } from "#/sync";

/**
 * Quoted "<repo>/<key>", ready to paste back into a shell.
 *
 * @example quoteRef(ref) → "\"main/Pamd64 nginx 1.0 ab\""
 */
export function quoteRef(ref: PackageRef): string {
  return `"${formatRepoRef(ref)}"`;
}

/**
 * Quoted "<repo>/<name>_<version>_<arch>"
 *
 * @example quoteDirRef(ref) → "\"main/nginx_1.0_amd64\""
 */
export function quoteDirRef(ref: PackageRef): string {
  return `"${ref.repo}/${formatDirRef(ref)}"`;
}

/**
 * Pluralize a count.
 *
 * @example plural(1, "package") → "1 package"
 * @example plural(3, "publish", "publishes") → "3 publishes"
 */
export function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function formatOutcomeItem(item: OutcomeItem): string {
  if (item.type === "package") {
    return `${item.action} ${quoteRef(item.ref)}`;
  }
  return `updated ${publishKey(item.target)}`;
}

/**
 * @example formatFailure(failure) → "failed /pkgs/a.deb [RemoteCallFailed]: boom"
 */
export function formatFailure(failure: OutcomeFailure): string {
  return `failed ${failure.item} [${failure.kind}]: ${failure.message}`;
}

export function formatFailureLines(failed: readonly OutcomeFailure[]): string[] {
  return failed.map(formatFailure);
}

// The package each command leaves behind; a move's removals are not listed
const PRIMARY_ACTION: Record<SyncCommand, PackageAction> = {
  put: "added",
  remove: "removed",
  copy: "copied",
};

/**
 * The command's packages as bare quoted references, one per line, so the
 * output of put and copy can be fed to remove or copy.
 */
export function formatOutcomeLines(outcome: SyncOutcome): string[] {
  const action = PRIMARY_ACTION[outcome.command];
  return outcome.succeeded.flatMap((item) =>
    item.type === "package" && item.action === action ? [quoteRef(item.ref)] : []
  );
}

/**
 * @example formatOutcomeSummary(outcome) → "put: 2 packages, 1 publish, 1 failure (partial-failure)"
 */
export function formatOutcomeSummary(outcome: SyncOutcome): string {
  const packages = outcome.succeeded.filter((item) => item.type === "package").length;
  const publishes = outcome.succeeded.length - packages;
  return [
    `${outcome.command}: ${plural(packages, "package")}`,
    plural(publishes, "publish", "publishes"),
    `${plural(outcome.failed.length, "failure")} (${outcome.status}${outcome.dryRun ? ", dry run" : ""})`,
  ].join(", ");
}

export interface SearchLineOptions {
  /** List the rotation surplus instead of every hit */
  rotated: boolean;
  /** "<repo>/<name>_<version>_<arch>" instead of aptly keys */
  dirRefs?: boolean;
}

/**
 * Search hits, or the rotation surplus when rotating, one quoted
 * reference per line.
 */
export function formatSearchLines(outcome: SearchOutcome, options: SearchLineOptions): string[] {
  const refs = options.rotated ? outcome.surplus : outcome.packages;
  return refs.map(options.dirRefs ? quoteDirRef : quoteRef);
}

export function formatRepoLines(repos: readonly RepoInfo[], detail: boolean): string[] {
  return repos.flatMap((repo) =>
    detail
      ? [
          repo.name,
          `    Default distribution: ${repo.defaultDistribution}`,
          `    Default component: ${repo.defaultComponent}`,
          `    Comment: ${repo.comment}`,
        ]
      : [repo.name]
  );
}

export function formatPublishLines(publishes: readonly PublishTarget[], detail: boolean): string[] {
  return publishes.flatMap((publish) => {
    const key = publishKey(publish);
    if (!detail) {
      return [key];
    }
    return [
      key,
      `    Source kind: ${publish.sourceKind}`,
      `    Storage: ${publish.storage ?? ""}`,
      `    Prefix: ${publish.prefix}`,
      `    Distribution: ${publish.distribution}`,
      `    Sources: ${publish.sourceRepos.join(", ")}`,
    ];
  });
}

/**
 * Text report of a command result for stdout
 */
export function formatResultLines(result: CommandResult): string[] {
  switch (result.kind) {
    case "sync":
      return formatOutcomeLines(result.outcome);
    case "search":
      return formatSearchLines(result.outcome, result);
    case "repos":
      return formatRepoLines(result.repos, result.detail);
    case "repo":
      return result.action === "deleted" ? [] : formatRepoLines([result.repo], true);
    case "publishes":
      return formatPublishLines(result.publishes, result.detail);
    case "publish":
      if (result.action === "created") {
        return formatPublishLines([result.publish], true);
      }
      return result.action === "updated" ? [publishKey(result.publish)] : [];
  }
}

/**
 * Plain-data form of a command result for --json output
 */
export function toJsonResult(result: CommandResult): Record<string, unknown> {
  switch (result.kind) {
    case "search": {
      const { outcome } = result;
      const format = result.dirRefs ? (ref: PackageRef) => `${ref.repo}/${formatDirRef(ref)}` : formatRepoRef;
      return {
        repos: outcome.repos,
        packages: outcome.packages.map(format),
        retained: outcome.retained.map(format),
        surplus: outcome.surplus.map(format),
        failed: outcome.failed,
      };
    }
    case "sync": {
      const { outcome } = result;
      return {
        command: outcome.command,
        status: outcome.status,
        dryRun: outcome.dryRun,
        succeeded: outcome.succeeded.map((item) =>
          item.type === "package"
            ? { type: "package", action: item.action, ref: formatRepoRef(item.ref) }
            : { type: "publish", publish: publishKey(item.target) }
        ),
        failed: outcome.failed,
      };
    }
    case "repos":
      return { repos: result.repos };
    case "repo":
      return result.action === "deleted"
        ? { action: result.action, repo: { name: result.name } }
        : { action: result.action, repo: result.repo };
    case "publishes":
      return {
        publishes: result.publishes.map((publish) => ({ key: publishKey(publish), ...publish })),
      };
    case "publish":
      return { action: result.action, publish: { key: publishKey(result.publish), ...result.publish } };
  }
}

/**
 * Failed items of the result; only sync and search results collect them
 */
export function resultFailures(result: CommandResult): OutcomeFailure[] {
  return result.kind === "sync" || result.kind === "search" ? result.outcome.failed : [];
}

/**
 * True when any item of the result failed
 */
export function hasFailures(result: CommandResult): boolean {
  return resultFailures(result).length > 0;
}
