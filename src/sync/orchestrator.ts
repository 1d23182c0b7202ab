/**
 * Sync orchestrator
 *
 * put:    staging -> mutating -> resolving -> refreshing -> done
 * remove: mutating -> resolving -> refreshing -> done
 * copy:   mutating -> resolving -> refreshing -> done
 *
 * Per-item failures are recorded and never stop sibling items. Input and
 * configuration defects throw before the first remote mutation. Nothing is
 * rolled back: the outcome lists what completed.
 */

import { DEFAULT_CONCURRENCY } from "#/constants";
import { EngineError, attempt, toEngineError, type Result } from "#/errors";
import { formatRepoRef, withRepo, type PackageRef } from "#/packageRef";
import { findDependentsOfRepos, publishKey, type PublishTarget } from "#/publish";
import type { PackageArtifact, StagingHandle } from "#/remote";
import { rotate } from "#/rotation";
import { resolveSigningConfig, validateSigningProfile } from "#/signing";
import { OutcomeBuilder } from "./outcome";
import { runPool } from "./pool";
import type {
  CopyInput,
  OutcomeFailure,
  PutInput,
  RemoveInput,
  SearchInput,
  SearchOutcome,
  SyncContext,
  SyncOutcome,
} from "./sync.types";

function concurrencyOf(ctx: SyncContext): number {
  return ctx.concurrency ?? DEFAULT_CONCURRENCY;
}

function invalidArgument(message: string, item?: string): EngineError {
  return new EngineError("InvalidArgument", message, { item });
}

/**
 * Upload directory for one put run: "<repo>_<unix seconds>"
 */
export function uploadDirName(repo: string, nowMs: number): string {
  return `${repo}_${Math.floor(nowMs / 1000)}`;
}

/**
 * Run the up-front checks of a command. A failing check moves the command
 * to the failed state and aborts it.
 */
function guard<T>(outcome: OutcomeBuilder, check: () => T): T {
  try {
    return check();
  } catch (err) {
    outcome.enter("failed");
    throw err;
  }
}

function readArtifacts(ctx: SyncContext, paths: readonly string[]): PackageArtifact[] {
  return paths.map((path) => {
    if (!ctx.fs.exists(path)) {
      throw invalidArgument(`Package file not found: ${path}`, path);
    }
    try {
      return { path, content: ctx.fs.readFileBinary(path) };
    } catch (err) {
      throw toEngineError(err, "InvalidArgument", path);
    }
  });
}

function uniqueRepos(refs: readonly PackageRef[]): string[] {
  return refs.reduce<string[]>((repos, ref) => (repos.includes(ref.repo) ? repos : [...repos, ref.repo]), []);
}

function announceDryRun(ctx: SyncContext, command: string): void {
  ctx.events.emit({
    level: "info",
    type: "dry-run",
    message: `Dry run: ${command} changes nothing on the server`,
    data: { command },
  });
}

/**
 * Find the publishes sourced from `repos` and refresh each once.
 * Refreshing is skipped entirely when no mutation succeeded. A dry run
 * lists the dependents and resolves their signing without refreshing.
 */
async function refreshDependents(
  ctx: SyncContext,
  outcome: OutcomeBuilder,
  repos: readonly string[],
  dryRun = false
): Promise<void> {
  if (outcome.mutationCount === 0) {
    ctx.events.emit({
      level: "info",
      type: "refresh-skipped",
      message: "Nothing changed, publishes left as they are",
    });
    return;
  }

  outcome.enter("resolving");
  const listed = await attempt(() => ctx.remote.listPublishes(), "RemoteCallFailed", "publish list");
  if (!listed.success) {
    outcome.fail("publish list", listed.error);
    return;
  }

  const dependents = findDependentsOfRepos(repos, listed.data);
  if (dependents.length === 0) {
    ctx.events.emit({
      level: "info",
      type: "no-dependents",
      message: `No publishes depend on ${repos.join(", ")}`,
      data: { kind: "NoDependentPublishes", repos: [...repos] },
    });
    return;
  }

  if (!dryRun) {
    outcome.enter("refreshing");
  }
  const results = await runPool(dependents, concurrencyOf(ctx), (target) =>
    attempt(
      async () => {
        const signing = resolveSigningConfig(ctx.signing, target);
        ctx.events.emit({
          level: "debug",
          type: "publish-refresh",
          message: `${dryRun ? "Would update" : "Updating"} ${publishKey(target)}${signing.skip ? " (unsigned)" : ` (key ${signing.gpgKey})`}`,
          data: { publish: publishKey(target) },
        });
        if (!dryRun) {
          await ctx.remote.refreshPublish(target, signing);
        }
        return target;
      },
      "RemoteCallFailed",
      publishKey(target)
    )
  );

  results.forEach((result, index) => {
    const target: PublishTarget | undefined = dependents[index];
    if (!target) return;
    if (result.success) {
      outcome.succeed({ type: "publish", target: result.data });
    } else {
      outcome.fail(publishKey(target), result.error);
    }
  });
}

/**
 * Upload package files, add them to `repo` and refresh its publishes.
 */
export async function runPut(ctx: SyncContext, input: PutInput): Promise<SyncOutcome> {
  const outcome = new OutcomeBuilder("put", ctx.events);
  const artifacts = guard(outcome, () => {
    if (!input.repo) {
      throw invalidArgument("No repo given");
    }
    if (input.artifacts.length === 0) {
      throw invalidArgument("No package files given");
    }
    validateSigningProfile(ctx.signing);
    return readArtifacts(ctx, input.artifacts);
  });
  const dir = uploadDirName(input.repo, (ctx.now ?? Date.now)());

  outcome.enter("staging");
  const uploads = await runPool(artifacts, concurrencyOf(ctx), (artifact) =>
    attempt(() => ctx.remote.uploadPackage(dir, artifact), "RemoteCallFailed", artifact.path)
  );

  const staged: StagingHandle[] = [];
  uploads.forEach((result, index) => {
    if (result.success) {
      staged.push(result.data);
    } else {
      outcome.fail(artifacts[index]?.path ?? result.error.item ?? "upload", result.error);
    }
  });

  if (staged.length > 0) {
    outcome.enter("mutating");
    const added = await runPool(staged, concurrencyOf(ctx), (handle) =>
      attempt(
        () => ctx.remote.addToRepo(input.repo, handle, { forceReplace: input.forceReplace }),
        "RemoteCallFailed",
        handle.source
      )
    );
    added.forEach((result, index) => {
      if (result.success) {
        outcome.succeed({ type: "package", action: "added", ref: result.data });
      } else {
        outcome.fail(staged[index]?.source ?? input.repo, result.error);
      }
    });

    const cleanup = await attempt(() => ctx.remote.deleteUploadDir(dir), "RemoteCallFailed", dir);
    if (!cleanup.success) {
      ctx.events.emit({
        level: "warn",
        type: "cleanup-failed",
        message: `Could not delete upload directory ${dir}: ${cleanup.error.message}`,
        data: { dir },
      });
    }
  }

  await refreshDependents(ctx, outcome, [input.repo]);
  return outcome.finish();
}

/**
 * Remove packages from their repos and refresh every affected publish.
 */
export async function runRemove(ctx: SyncContext, input: RemoveInput): Promise<SyncOutcome> {
  const outcome = new OutcomeBuilder("remove", ctx.events, input.dryRun);
  guard(outcome, () => {
    if (input.refs.length === 0) {
      throw invalidArgument("No packages given");
    }
    validateSigningProfile(ctx.signing);
  });

  if (input.dryRun) {
    announceDryRun(ctx, "remove");
    for (const ref of input.refs) {
      outcome.succeed({ type: "package", action: "removed", ref });
    }
    await refreshDependents(ctx, outcome, uniqueRepos(input.refs), true);
    return outcome.finish();
  }

  outcome.enter("mutating");
  const results = await runPool(input.refs, concurrencyOf(ctx), (ref) =>
    attempt(() => ctx.remote.removeFromRepo(ref.repo, ref), "RemoteCallFailed", formatRepoRef(ref))
  );

  const changedRepos: string[] = [];
  results.forEach((result, index) => {
    const ref = input.refs[index];
    if (!ref) return;
    if (result.success) {
      outcome.succeed({ type: "package", action: "removed", ref });
      if (!changedRepos.includes(ref.repo)) {
        changedRepos.push(ref.repo);
      }
    } else {
      outcome.fail(formatRepoRef(ref), result.error);
    }
  });

  await refreshDependents(ctx, outcome, changedRepos);
  return outcome.finish();
}

interface CopyResult {
  copied: PackageRef;
  removal?: Result<void>;
}

/**
 * Copy (or move) packages between repos. Only the destination's publishes
 * are refreshed.
 */
export async function runCopy(ctx: SyncContext, input: CopyInput): Promise<SyncOutcome> {
  const outcome = new OutcomeBuilder("copy", ctx.events, input.dryRun);
  guard(outcome, () => {
    if (!input.from || !input.to) {
      throw invalidArgument("Both source and destination repos are required");
    }
    if (input.from === input.to) {
      throw invalidArgument(`Source and destination repo are the same: ${input.from}`, input.from);
    }
    if (input.refs.length === 0) {
      throw invalidArgument("No packages given");
    }
    validateSigningProfile(ctx.signing);
  });

  if (input.dryRun) {
    announceDryRun(ctx, "copy");
    for (const ref of input.refs) {
      outcome.succeed({ type: "package", action: "copied", ref: withRepo(ref, input.to) });
      if (input.move) {
        outcome.succeed({ type: "package", action: "removed", ref: withRepo(ref, input.from) });
      }
    }
    await refreshDependents(ctx, outcome, [input.to], true);
    return outcome.finish();
  }

  outcome.enter("mutating");
  const results = await runPool(input.refs, concurrencyOf(ctx), (ref) =>
    attempt(
      async (): Promise<CopyResult> => {
        const copied = await ctx.remote.copyBetweenRepos(input.from, input.to, ref);
        if (!input.move) {
          return { copied };
        }
        // The copy resolved the files hash; remove exactly that build
        const source = withRepo(copied, input.from);
        const removal = await attempt(
          () => ctx.remote.removeFromRepo(input.from, source),
          "RemoteCallFailed",
          formatRepoRef(source)
        );
        return { copied, removal };
      },
      "RemoteCallFailed",
      formatRepoRef(ref)
    )
  );

  results.forEach((result, index) => {
    const ref = input.refs[index];
    if (!ref) return;
    if (!result.success) {
      outcome.fail(formatRepoRef(ref), result.error);
      return;
    }
    const { copied, removal } = result.data;
    outcome.succeed({ type: "package", action: "copied", ref: copied });
    const source = withRepo(copied, input.from);
    if (removal?.success) {
      outcome.succeed({ type: "package", action: "removed", ref: source });
    } else if (removal) {
      outcome.fail(formatRepoRef(source), removal.error);
    }
  });

  await refreshDependents(ctx, outcome, [input.to]);
  return outcome.finish();
}

/**
 * aptly query matching package names against a regular expression
 *
 * @example nameQuery("^nginx") → "Name (~ ^nginx)"
 */
export function nameQuery(pattern: string): string {
  return `Name (~ ${pattern})`;
}

async function searchableRepos(ctx: SyncContext, repos: readonly string[]): Promise<string[]> {
  if (repos.length > 0) {
    return [...repos];
  }
  const listed = (await ctx.remote.listRepos()).map((repo) => repo.name).sort();
  if (listed.length === 0) {
    throw invalidArgument("No repos given and the service has no local repos");
  }
  return listed;
}

/**
 * Search repos and, with `keep`, split the hits into retained and surplus
 * per repo and query. Without repos every local repo is searched. Read-only.
 */
export async function runSearchWithRotation(
  ctx: SyncContext,
  input: SearchInput
): Promise<SearchOutcome> {
  const given = input.queries ?? [];
  if (input.byName && given.length === 0) {
    throw invalidArgument("Searching by name needs at least one query");
  }
  if (input.keep !== undefined) {
    // Validates the count before any remote call
    rotate([], input.keep);
  }

  const repos = await searchableRepos(ctx, input.repos);
  const queries = given.length > 0 ? given.map((query) => (input.byName ? nameQuery(query) : query)) : [undefined];
  ctx.events.emit({
    level: "info",
    type: "search",
    message: `Searching in repos ${repos.join(", ")}`,
    data: { repos, queries: given },
  });

  const jobs = queries.flatMap((query) => repos.map((repo) => ({ repo, query })));
  const results = await runPool(jobs, concurrencyOf(ctx), (job) =>
    attempt(() => ctx.remote.searchRepo(job.repo, job.query), "RemoteCallFailed", job.repo)
  );

  const packages: PackageRef[] = [];
  const retained: PackageRef[] = [];
  const surplus: PackageRef[] = [];
  const failed: OutcomeFailure[] = [];

  results.forEach((result, index) => {
    const job = jobs[index];
    if (!job) return;
    if (!result.success) {
      const item = job.query === undefined ? job.repo : `${job.repo} (${job.query})`;
      failed.push({ item, kind: result.error.kind, message: result.error.message });
      ctx.events.emit({
        level: "error",
        type: "item-failed",
        message: `${item}: ${result.error.message}`,
        data: { command: "search", item, kind: result.error.kind },
      });
      return;
    }
    packages.push(...result.data);
    if (input.keep === undefined) {
      retained.push(...result.data);
      return;
    }
    const rotation = rotate(result.data, input.keep);
    retained.push(...rotation.retained);
    surplus.push(...rotation.surplus);
  });

  return { repos, packages, retained, surplus, failed };
}
