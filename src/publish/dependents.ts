/**
 * Publish dependency resolution
 *
 * A publish depends on a repo only when its own source list names the
 * repo. Nothing is followed transitively.
 */

import type { PublishTarget } from "./publish.types";

/**
 * Publishes sourced from `repo`, in input order. An empty result is valid.
 */
export function findDependents(
  repo: string,
  publishes: readonly PublishTarget[]
): PublishTarget[] {
  return publishes.filter((publish) => publish.sourceRepos.includes(repo));
}

/**
 * Publishes sourced from any of `repos`, each at most once, in input order.
 */
export function findDependentsOfRepos(
  repos: readonly string[],
  publishes: readonly PublishTarget[]
): PublishTarget[] {
  return publishes.filter((publish) =>
    publish.sourceRepos.some((source) => repos.includes(source))
  );
}
