/**
 * Rotation
 *
 * Keep the newest `keep` builds of every (name, architecture) group and
 * mark the rest as surplus.
 */

import { EngineError } from "#/errors";
import { parseVersion, compareParsedVersions, type ParsedVersion } from "#/version";
import type { PackageRef } from "#/packageRef";

export interface RotationResult {
  /** Newest builds of each group, in input order */
  retained: PackageRef[];
  /** Everything else, in input order */
  surplus: PackageRef[];
}

interface Entry {
  index: number;
  version: ParsedVersion;
}

function groupKey(ref: PackageRef): string {
  return `${ref.name}\u0000${ref.arch}`;
}

export function rotate(packages: readonly PackageRef[], keep: number): RotationResult {
  if (!Number.isInteger(keep) || keep < 0) {
    throw new EngineError("InvalidArgument", `Rotation count must be a non-negative integer, got ${keep}`, {
      item: String(keep),
    });
  }

  // Parse everything first so a bad version aborts before any partitioning
  const entries = packages.map((ref, index) => ({ index, version: parseVersion(ref.version) }));

  const groups = new Map<string, Entry[]>();
  for (const entry of entries) {
    const ref = packages[entry.index];
    if (!ref) continue;
    const key = groupKey(ref);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  const kept = new Set<number>();
  for (const group of groups.values()) {
    // Array.prototype.sort is stable: equal versions keep input order
    const newestFirst = [...group].sort((a, b) => compareParsedVersions(b.version, a.version));
    for (const entry of newestFirst.slice(0, keep)) {
      kept.add(entry.index);
    }
  }

  const retained: PackageRef[] = [];
  const surplus: PackageRef[] = [];
  packages.forEach((ref, index) => {
    (kept.has(index) ? retained : surplus).push(ref);
  });

  return { retained, surplus };
}
