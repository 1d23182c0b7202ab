/**
 * Publish types
 */

export type PublishSourceKind = "local" | "snapshot";

/**
 * A publish as the service lists it.
 * `prefix` is "." for the root prefix. `sourceRepos` holds local repo names
 * and is empty for snapshot publishes.
 */
export interface PublishTarget {
  readonly storage?: string;
  readonly prefix: string;
  readonly distribution: string;
  readonly sourceRepos: readonly string[];
  readonly sourceKind: PublishSourceKind;
}

/**
 * Where a publish lives, without its sources
 */
export type PublishLocation = Pick<PublishTarget, "storage" | "prefix" | "distribution">;
