import { EngineError } from "#/errors";
import { ROOT_PREFIX } from "#/constants";
import type { PublishLocation } from "./publish.types";

/**
 * "[storage:]prefix", with an empty prefix normalized to the root prefix
 */
export function fullPrefix(location: PublishLocation): string {
  const prefix = location.prefix || ROOT_PREFIX;
  return location.storage ? `${location.storage}:${prefix}` : prefix;
}

/**
 * Identity key of a publish, used to look up signing overrides.
 *
 * @example publishKey({ prefix: ".", distribution: "stretch" }) → "./stretch"
 * @example publishKey({ storage: "s3", prefix: "debian", distribution: "buster" }) → "s3:debian/buster"
 */
export function publishKey(location: PublishLocation): string {
  return `${fullPrefix(location)}/${location.distribution}`;
}

/**
 * Parse "[storage:]prefix/distribution". A spec without "/" is a
 * distribution under the root prefix. Storage is everything before the
 * last ":" of the prefix part.
 */
export function parsePublishSpec(spec: string): PublishLocation {
  const slash = spec.lastIndexOf("/");
  if (slash === -1) {
    if (spec.length === 0) {
      throw new EngineError("InvalidArgument", "Empty publish spec", { item: spec });
    }
    return { prefix: ROOT_PREFIX, distribution: spec };
  }

  const head = spec.slice(0, slash);
  const distribution = spec.slice(slash + 1);
  if (head.length === 0 || distribution.length === 0) {
    throw new EngineError("InvalidArgument", `Invalid publish spec '${spec}'`, { item: spec });
  }

  const colon = head.lastIndexOf(":");
  if (colon === -1) {
    return { prefix: head, distribution };
  }

  const storage = head.slice(0, colon);
  const prefix = head.slice(colon + 1);
  if (storage.length === 0 || prefix.length === 0) {
    throw new EngineError("InvalidArgument", `Invalid publish spec '${spec}'`, { item: spec });
  }
  return { storage, prefix, distribution };
}

/**
 * Escape the full prefix for use in a publish URL: the bare root prefix
 * becomes ":.", otherwise "_" doubles and "/" becomes "_".
 */
export function escapePublishPrefix(location: PublishLocation): string {
  const prefix = fullPrefix(location);
  if (prefix === ROOT_PREFIX) {
    return ":.";
  }
  return prefix.replace(/_/g, "__").replace(/\//g, "_");
}
