/**
 * Package references
 *
 * Accepted forms, each optionally preceded by "<repo>/":
 *   aptly key:   "[<prefix>]P<arch> <name> <version>[ <hash>]"
 *   direct ref:  "<name>_<version>_<arch>"
 */

import { EngineError } from "#/errors";
import { parseVersion } from "#/version";
import { PACKAGE_KEY_REGEX, DIR_REF_REGEX } from "#/constants";
import type { PackageRef } from "./packageRef.types";

function splitRepo(reference: string): { repo: string | undefined; ref: string } {
  const slash = reference.indexOf("/");
  if (slash === -1) {
    return { repo: undefined, ref: reference };
  }
  const repo = reference.slice(0, slash);
  return { repo: repo.length > 0 ? repo : undefined, ref: reference.slice(slash + 1) };
}

/**
 * Parse a package reference.
 * A repo in the reference wins over `defaultRepo`. Throws InvalidArgument
 * when the reference is malformed or names no repo, InvalidVersion when the
 * version is not a Debian version.
 *
 * @example parsePackageRef("stretch_main/Pamd64 nginx 1.14.0-1 a1b2c3")
 * @example parsePackageRef("nginx_1.14.0-1_amd64", "stretch_main")
 */
export function parsePackageRef(reference: string, defaultRepo?: string): PackageRef {
  const { repo: explicitRepo, ref } = splitRepo(reference.trim());
  const repo = explicitRepo ?? defaultRepo;

  if (!repo) {
    throw new EngineError("InvalidArgument", `No repo given for package reference '${reference}'`, {
      item: reference,
    });
  }

  const key = PACKAGE_KEY_REGEX.exec(ref);
  if (key) {
    const [, prefix = "", arch = "", name = "", version = "", hash = ""] = key;
    parseVersion(version);
    return { repo, prefix, arch, name, version, hash };
  }

  const dir = DIR_REF_REGEX.exec(ref);
  if (dir) {
    const [, name = "", version = "", arch = ""] = dir;
    parseVersion(version);
    return { repo, prefix: "", arch, name, version, hash: "" };
  }

  throw new EngineError("InvalidArgument", `Incorrect package reference '${reference}'`, {
    item: reference,
  });
}

/**
 * aptly package key.
 *
 * @example formatPackageKey(ref) → "Pamd64 nginx 1.14.0-1 a1b2c3"
 */
export function formatPackageKey(ref: PackageRef): string {
  const hash = ref.hash ? ` ${ref.hash}` : "";
  return `${ref.prefix}P${ref.arch} ${ref.name} ${ref.version}${hash}`;
}

export function formatDirRef(ref: PackageRef): string {
  return `${ref.name}_${ref.version}_${ref.arch}`;
}

/**
 * "<repo>/<key>", the form accepted back by parsePackageRef
 */
export function formatRepoRef(ref: PackageRef): string {
  return `${ref.repo}/${formatPackageKey(ref)}`;
}

export function withRepo(ref: PackageRef, repo: string): PackageRef {
  return { ...ref, repo };
}

/**
 * Same build, ignoring which repo it lives in
 */
export function isSamePackage(a: PackageRef, b: PackageRef): boolean {
  return (
    a.prefix === b.prefix &&
    a.arch === b.arch &&
    a.name === b.name &&
    a.version === b.version &&
    a.hash === b.hash
  );
}
