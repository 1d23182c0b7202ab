import { describe, test, expect } from "vitest";
import { findDependents, findDependentsOfRepos } from "./dependents";
import type { PublishTarget } from "./publish.types";

function publish(distribution: string, sourceRepos: string[]): PublishTarget {
  return { prefix: ".", distribution, sourceRepos, sourceKind: "local" };
}

describe("dependents", () => {
  const publishes = [
    publish("one", ["repoA"]),
    publish("two", ["repoB"]),
    publish("three", ["repoB", "repoA"]),
    publish("four", ["repoA-extra"]),
    { prefix: ".", distribution: "snap", sourceRepos: [], sourceKind: "snapshot" } satisfies PublishTarget,
  ];

  describe("findDependents", () => {
    test("returns publishes whose sources contain the repo, in input order", () => {
      expect(findDependents("repoA", publishes).map((p) => p.distribution)).toEqual([
        "one",
        "three",
      ]);
    });

    test("matches names literally", () => {
      expect(findDependents("repo", publishes)).toEqual([]);
      expect(findDependents("repoA-extra", publishes).map((p) => p.distribution)).toEqual([
        "four",
      ]);
    });

    test("returns empty when nothing depends on the repo", () => {
      expect(findDependents("repoZ", publishes)).toEqual([]);
      expect(findDependents("repoA", [])).toEqual([]);
    });
  });

  describe("findDependentsOfRepos", () => {
    test("returns each publish once", () => {
      expect(
        findDependentsOfRepos(["repoA", "repoB"], publishes).map((p) => p.distribution)
      ).toEqual(["one", "two", "three"]);
    });

    test("returns empty for no repos", () => {
      expect(findDependentsOfRepos([], publishes)).toEqual([]);
    });
  });
});
