/**
 * Repo and publish administration
 *
 * Single remote calls around the sync workflows: listing, creating, editing
 * and deleting local repos, and creating, updating and dropping publishes.
 * Remote failures propagate as they are; there is no per-item accounting.
 */

import { EngineError } from "#/errors";
import {
  parsePublishSpec,
  publishKey,
  type PublishLocation,
  type PublishSourceKind,
  type PublishTarget,
} from "#/publish";
import type { PublishSource, RepoInfo, RepoSettings } from "#/remote";
import { resolveSigningConfig } from "#/signing";
import type {
  CreatePublishInput,
  CreateRepoInput,
  DeleteRepoInput,
  DropPublishInput,
  EditRepoInput,
  ManageContext,
  UpdatePublishInput,
} from "./manage.types";

const SOURCE_KINDS: readonly PublishSourceKind[] = ["local", "snapshot"];

export function isPublishSourceKind(value: string): value is PublishSourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

function requireRepoName(name: string): string {
  if (name.length === 0 || name.includes("/")) {
    throw new EngineError("InvalidArgument", `Invalid repo name '${name}'`, { item: name });
  }
  return name;
}

/**
 * Parse a publish source given as "name" or "name=component".
 *
 * @example parsePublishSource("stretch_main=main") → { name: "stretch_main", component: "main" }
 */
export function parsePublishSource(source: string): PublishSource {
  const separator = source.indexOf("=");
  const name = separator === -1 ? source : source.slice(0, separator);
  const component = separator === -1 ? "" : source.slice(separator + 1);
  if (name.length === 0) {
    throw new EngineError("InvalidArgument", `Invalid publish source '${source}'`, { item: source });
  }
  return component ? { name, component } : { name };
}

export async function listRepos(ctx: ManageContext): Promise<RepoInfo[]> {
  const repos = await ctx.remote.listRepos();
  return [...repos].sort(byKey((repo) => repo.name));
}

export async function createRepo(ctx: ManageContext, input: CreateRepoInput): Promise<RepoInfo> {
  const created = await ctx.remote.createRepo(requireRepoName(input.name), input.settings ?? {});
  ctx.events.emit({
    level: "info",
    type: "repo-created",
    message: `Created repo ${created.name}`,
    data: { repo: created.name },
  });
  return created;
}

function hasSettings(settings: RepoSettings): boolean {
  return Object.values(settings).some((value) => value !== undefined);
}

export async function editRepo(ctx: ManageContext, input: EditRepoInput): Promise<RepoInfo> {
  requireRepoName(input.name);
  if (!hasSettings(input.settings)) {
    throw new EngineError("InvalidArgument", `Nothing to change for repo ${input.name}`, {
      item: input.name,
    });
  }
  const edited = await ctx.remote.editRepo(input.name, input.settings);
  ctx.events.emit({
    level: "info",
    type: "repo-edited",
    message: `Edited repo ${edited.name}`,
    data: { repo: edited.name },
  });
  return edited;
}

export async function deleteRepo(ctx: ManageContext, input: DeleteRepoInput): Promise<void> {
  await ctx.remote.deleteRepo(requireRepoName(input.name), input.force ?? false);
  ctx.events.emit({
    level: "info",
    type: "repo-deleted",
    message: `Deleted repo ${input.name}`,
    data: { repo: input.name },
  });
}

/**
 * Publishes ordered by their key
 */
export async function listPublishes(ctx: ManageContext): Promise<PublishTarget[]> {
  const publishes = await ctx.remote.listPublishes();
  return [...publishes].sort(byKey(publishKey));
}

/**
 * Publish local repos or snapshots under a new prefix and distribution,
 * signed with the configuration resolved for that publish.
 */
export async function createPublish(
  ctx: ManageContext,
  input: CreatePublishInput
): Promise<PublishTarget> {
  const location = parsePublishSpec(input.spec);
  if (input.sources.length === 0) {
    throw new EngineError("InvalidArgument", `No sources given for ${publishKey(location)}`, {
      item: input.spec,
    });
  }
  const sources = input.sources.map(parsePublishSource);
  const signing = resolveSigningConfig(ctx.signing, location);

  const created = await ctx.remote.createPublish(
    {
      location,
      sourceKind: input.sourceKind,
      sources,
      architectures: input.architectures,
      label: input.label,
      origin: input.origin,
      forceOverwrite: input.forceOverwrite,
    },
    signing
  );
  ctx.events.emit({
    level: "info",
    type: "publish-created",
    message: `Published ${sources.map((source) => source.name).join(", ")} as ${publishKey(created)}`,
    data: { publish: publishKey(created) },
  });
  return created;
}

/**
 * Refresh one publish from its sources
 */
export async function updatePublish(
  ctx: ManageContext,
  input: UpdatePublishInput
): Promise<PublishLocation> {
  const location = parsePublishSpec(input.spec);
  const signing = resolveSigningConfig(ctx.signing, location);
  await ctx.remote.refreshPublish(location, signing, { forceOverwrite: input.forceOverwrite });
  ctx.events.emit({
    level: "info",
    type: "publish-updated",
    message: `Updated ${publishKey(location)}${signing.skip ? " (unsigned)" : ""}`,
    data: { publish: publishKey(location) },
  });
  return location;
}

export async function dropPublish(ctx: ManageContext, input: DropPublishInput): Promise<PublishLocation> {
  const location = parsePublishSpec(input.spec);
  await ctx.remote.dropPublish(location, input.force ?? false);
  ctx.events.emit({
    level: "info",
    type: "publish-dropped",
    message: `Dropped ${publishKey(location)}`,
    data: { publish: publishKey(location) },
  });
  return location;
}
