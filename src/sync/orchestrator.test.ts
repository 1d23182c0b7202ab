import { describe, test, expect } from "vitest";
import { EngineError } from "#/errors";
import { computeFilesHash, describePackageFile, type PackageRef } from "#/packageRef";
import type { PublishTarget } from "#/publish";
import type { SigningProfile } from "#/signing";
import {
  createFakeRemote,
  createMemorySink,
  createMockFileSystem,
  type FakeRemoteOptions,
} from "#/test-utils/mocks";
import { runPut, runRemove, runCopy, runSearchWithRotation, uploadDirName } from "./orchestrator";
import type { SyncContext } from "./sync.types";

const PKG_A = "/pkgs/pkga_1.0_amd64.deb";
const PKG_B = "/pkgs/pkgb_2.0_amd64.deb";

const stretch: PublishTarget = {
  prefix: ".",
  distribution: "stretch",
  sourceRepos: ["stretch_main"],
  sourceKind: "local",
};
const stretchS3: PublishTarget = {
  storage: "s3",
  prefix: "debian",
  distribution: "stretch",
  sourceRepos: ["stretch_extra", "stretch_main"],
  sourceKind: "local",
};
const buster: PublishTarget = {
  prefix: ".",
  distribution: "buster",
  sourceRepos: ["buster_main"],
  sourceKind: "local",
};

const signing: SigningProfile = {
  signing: { gpgKey: "release@example.test" },
  signingOverrides: { "s3:debian/stretch": { skip: true } },
};

function pkg(repo: string, name: string, version: string, hash = "aa"): PackageRef {
  return { repo, prefix: "", arch: "amd64", name, version, hash };
}

function addedRef(path: string, content: string, name: string, version: string): PackageRef {
  const hash = computeFilesHash(describePackageFile(path, Buffer.from(content)));
  return { repo: "stretch_main", prefix: "", arch: "amd64", name, version, hash };
}

function setup(options: FakeRemoteOptions = {}, overrides: Partial<SyncContext> = {}) {
  const remote = createFakeRemote({
    repos: { stretch_main: [], stretch_extra: [], buster_main: [] },
    publishes: [stretch, buster, stretchS3],
    ...options,
  });
  const events = createMemorySink();
  const fs = createMockFileSystem({ [PKG_A]: "A", [PKG_B]: "B" });
  const ctx: SyncContext = {
    remote,
    events,
    fs,
    signing,
    now: () => 1_700_000_000_123,
    ...overrides,
  };
  return { ctx, remote, events };
}

function kindOf(err: unknown): string | undefined {
  return err instanceof EngineError ? err.kind : undefined;
}

describe("orchestrator", () => {
  describe("uploadDirName", () => {
    test("uses whole seconds", () => {
      expect(uploadDirName("stretch_main", 1_700_000_000_999)).toBe("stretch_main_1700000000");
    });
  });

  describe("runPut", () => {
    test("records a failed upload and still adds and refreshes the rest", async () => {
      const { ctx } = setup({ failUploads: [PKG_A] });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });

      expect(outcome.status).toBe("partial-failure");
      expect(outcome.failed).toEqual([
        { item: PKG_A, kind: "RemoteCallFailed", message: `Upload of ${PKG_A} failed` },
      ]);
      expect(outcome.succeeded).toEqual([
        { type: "package", action: "added", ref: addedRef(PKG_B, "B", "pkgb", "2.0") },
        { type: "publish", target: stretch },
        { type: "publish", target: stretchS3 },
      ]);
    });

    test("signs each dependent publish with its resolved config", async () => {
      const { ctx, remote } = setup();

      await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(remote.refreshed).toEqual([
        {
          key: "./stretch",
          signing: { skip: false, batch: true, gpgKey: "release@example.test" },
          forceOverwrite: false,
        },
        {
          key: "s3:debian/stretch",
          signing: { skip: true, batch: true, gpgKey: "release@example.test" },
          forceOverwrite: false,
        },
      ]);
    });

    test("stages into one upload directory and deletes it afterwards", async () => {
      const { ctx, remote } = setup();

      await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });

      const uploads = remote.calls.filter((call) => call.op === "uploadPackage");
      expect(uploads.map((call) => call.args)).toEqual([
        ["stretch_main_1700000000", PKG_A],
        ["stretch_main_1700000000", PKG_B],
      ]);
      expect(remote.calls.filter((call) => call.op === "deleteUploadDir")).toEqual([
        { op: "deleteUploadDir", args: ["stretch_main_1700000000"] },
      ]);
      expect(remote.uploadDirs.size).toBe(0);
    });

    test("re-running with existing packages fails every add and refreshes nothing", async () => {
      const { ctx, remote, events } = setup();
      await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });
      remote.calls.length = 0;
      remote.refreshed.length = 0;

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });

      expect(outcome.status).toBe("failure");
      expect(outcome.succeeded).toEqual([]);
      expect(outcome.failed).toEqual([
        {
          item: PKG_A,
          kind: "RemoteCallFailed",
          message: "Package pkga_1.0_amd64 already exists in stretch_main",
        },
        {
          item: PKG_B,
          kind: "RemoteCallFailed",
          message: "Package pkgb_2.0_amd64 already exists in stretch_main",
        },
      ]);
      expect(remote.refreshed).toEqual([]);
      expect(remote.calls.some((call) => call.op === "listPublishes")).toBe(false);
      expect(events.ofType("refresh-skipped")).toHaveLength(1);
    });

    test("fails overall when every upload fails", async () => {
      const { ctx, remote } = setup({ failUploads: [PKG_A, PKG_B] });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });

      expect(outcome.status).toBe("failure");
      expect(outcome.failed.map((failure) => failure.item)).toEqual([PKG_A, PKG_B]);
      expect(remote.calls.map((call) => call.op)).toEqual(["uploadPackage", "uploadPackage"]);
    });

    test("records a failed publish refresh without stopping the others", async () => {
      const { ctx, remote } = setup({ failItems: ["./stretch"] });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(outcome.status).toBe("partial-failure");
      expect(outcome.failed).toEqual([
        { item: "./stretch", kind: "RemoteCallFailed", message: "Unable to update ./stretch" },
      ]);
      expect(remote.refreshed.map((entry) => entry.key)).toEqual(["s3:debian/stretch"]);
    });

    test("records a failed publish listing", async () => {
      const { ctx } = setup({ failListPublishes: true });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(outcome.status).toBe("partial-failure");
      expect(outcome.failed).toEqual([
        { item: "publish list", kind: "RemoteCallFailed", message: "publish list unavailable" },
      ]);
    });

    test("reports no dependents as information, not failure", async () => {
      const { ctx, events } = setup({ publishes: [buster] });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(outcome.status).toBe("success");
      const [event] = events.ofType("no-dependents");
      expect(event?.level).toBe("info");
      expect(event?.data).toEqual({ kind: "NoDependentPublishes", repos: ["stretch_main"] });
    });

    test("turns a failed cleanup into a warning", async () => {
      const { ctx, events } = setup({ failCleanup: true });

      const outcome = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(outcome.status).toBe("success");
      expect(outcome.failed).toEqual([]);
      expect(events.ofType("cleanup-failed").map((event) => event.level)).toEqual(["warn"]);
    });

    test("outcome order does not depend on concurrency", async () => {
      const serial = setup({ failUploads: [PKG_A] }, { concurrency: 1 });
      const parallel = setup({ failUploads: [PKG_A] }, { concurrency: 8 });

      const a = await runPut(serial.ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });
      const b = await runPut(parallel.ctx, { repo: "stretch_main", artifacts: [PKG_A, PKG_B] });

      expect(b).toEqual(a);
    });

    test("emits state transitions in order", async () => {
      const { ctx, events } = setup();

      await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] });

      expect(events.ofType("state").map((event) => event.data?.["state"])).toEqual([
        "staging",
        "mutating",
        "resolving",
        "refreshing",
        "done",
      ]);
    });

    test("aborts on a missing package file before any remote call", async () => {
      const { ctx, remote, events } = setup();

      const error = await runPut(ctx, { repo: "stretch_main", artifacts: ["/pkgs/missing.deb"] }).catch(
        (err: unknown) => err
      );

      expect(kindOf(error)).toBe("InvalidArgument");
      expect(remote.calls).toEqual([]);
      expect(events.ofType("state").map((event) => event.data?.["state"])).toEqual(["failed"]);
    });

    test("aborts on a broken signing setup before any remote call", async () => {
      const { ctx, remote } = setup(
        {},
        { signing: { signing: {}, signingOverrides: { "./stretch": { skip: false } } } }
      );

      const error = await runPut(ctx, { repo: "stretch_main", artifacts: [PKG_B] }).catch(
        (err: unknown) => err
      );

      expect(kindOf(error)).toBe("MissingSigningKey");
      expect(remote.calls).toEqual([]);
    });

    test("rejects an empty artifact list", async () => {
      const { ctx } = setup();

      await expect(runPut(ctx, { repo: "stretch_main", artifacts: [] })).rejects.toThrow(
        "No package files given"
      );
    });
  });

  describe("runRemove", () => {
    test("removes across repos and refreshes publishes of changed repos only", async () => {
      const { ctx, remote } = setup({
        repos: {
          stretch_main: [pkg("stretch_main", "nginx", "1.0")],
          stretch_extra: [],
          buster_main: [pkg("buster_main", "nginx", "1.0")],
        },
        failItems: ["buster_main/nginx"],
      });

      const outcome = await runRemove(ctx, {
        refs: [pkg("stretch_main", "nginx", "1.0"), pkg("buster_main", "nginx", "1.0")],
      });

      expect(outcome.status).toBe("partial-failure");
      expect(outcome.succeeded).toEqual([
        { type: "package", action: "removed", ref: pkg("stretch_main", "nginx", "1.0") },
        { type: "publish", target: stretch },
        { type: "publish", target: stretchS3 },
      ]);
      expect(outcome.failed).toEqual([
        {
          item: "buster_main/Pamd64 nginx 1.0 aa",
          kind: "RemoteCallFailed",
          message: "Unable to remove nginx from buster_main",
        },
      ]);
      expect(remote.repos.get("stretch_main")).toEqual([]);
    });

    test("refreshes a publish shared by several changed repos once", async () => {
      const { ctx, remote } = setup({
        repos: {
          stretch_main: [pkg("stretch_main", "a", "1.0")],
          stretch_extra: [pkg("stretch_extra", "b", "1.0")],
          buster_main: [],
        },
      });

      await runRemove(ctx, {
        refs: [pkg("stretch_main", "a", "1.0"), pkg("stretch_extra", "b", "1.0")],
      });

      expect(remote.refreshed.map((entry) => entry.key)).toEqual(["./stretch", "s3:debian/stretch"]);
    });

    test("skips refreshing when nothing was removed", async () => {
      const { ctx, remote } = setup();

      const outcome = await runRemove(ctx, { refs: [pkg("stretch_main", "ghost", "1.0")] });

      expect(outcome.status).toBe("failure");
      expect(remote.refreshed).toEqual([]);
    });

    test("rejects an empty list", async () => {
      const { ctx } = setup();
      await expect(runRemove(ctx, { refs: [] })).rejects.toThrow("No packages given");
    });

    test("dry run lists removals and dependents without changing anything", async () => {
      const { ctx, remote, events } = setup({
        repos: {
          stretch_main: [pkg("stretch_main", "nginx", "1.0")],
          stretch_extra: [],
          buster_main: [],
        },
      });

      const outcome = await runRemove(ctx, { refs: [pkg("stretch_main", "nginx", "1.0")], dryRun: true });

      expect(outcome.status).toBe("success");
      expect(outcome.dryRun).toBe(true);
      expect(outcome.succeeded).toEqual([
        { type: "package", action: "removed", ref: pkg("stretch_main", "nginx", "1.0") },
        { type: "publish", target: stretch },
        { type: "publish", target: stretchS3 },
      ]);
      expect(remote.calls.map((call) => call.op)).toEqual(["listPublishes"]);
      expect(remote.repos.get("stretch_main")).toHaveLength(1);
      expect(remote.refreshed).toEqual([]);
      expect(events.ofType("item-succeeded")[0]?.message).toBe(
        "stretch_main/Pamd64 nginx 1.0 aa would be removed"
      );
    });
  });

  describe("runCopy", () => {
    const source = {
      stretch_main: [pkg("stretch_main", "nginx", "1.0"), pkg("stretch_main", "curl", "7.0")],
      stretch_extra: [],
      buster_main: [],
    };

    test("copies and refreshes only the destination's publishes", async () => {
      const { ctx, remote } = setup({ repos: source });

      const outcome = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [pkg("stretch_main", "nginx", "1.0")],
      });

      expect(outcome.status).toBe("success");
      expect(outcome.succeeded).toEqual([
        { type: "package", action: "copied", ref: pkg("buster_main", "nginx", "1.0") },
        { type: "publish", target: buster },
      ]);
      expect(remote.repos.get("stretch_main")).toHaveLength(2);
    });

    test("move removes from the source without touching its publishes", async () => {
      const { ctx, remote } = setup({ repos: source });

      const outcome = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [pkg("stretch_main", "nginx", "1.0")],
        move: true,
      });

      expect(outcome.succeeded).toEqual([
        { type: "package", action: "copied", ref: pkg("buster_main", "nginx", "1.0") },
        { type: "package", action: "removed", ref: pkg("stretch_main", "nginx", "1.0") },
        { type: "publish", target: buster },
      ]);
      expect(remote.repos.get("stretch_main")).toEqual([pkg("stretch_main", "curl", "7.0")]);
      expect(remote.refreshed.map((entry) => entry.key)).toEqual(["./buster"]);
    });

    test("records a failed removal after a successful copy", async () => {
      const { ctx } = setup({ repos: source, failItems: ["stretch_main/nginx"] });

      const outcome = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [pkg("stretch_main", "nginx", "1.0")],
        move: true,
      });

      expect(outcome.status).toBe("partial-failure");
      expect(outcome.failed).toEqual([
        {
          item: "stretch_main/Pamd64 nginx 1.0 aa",
          kind: "RemoteCallFailed",
          message: "Unable to remove nginx from stretch_main",
        },
      ]);
    });

    test("move removes the build the copy resolved from a hashless reference", async () => {
      const { ctx, remote } = setup({ repos: source });
      const hashless = { ...pkg("stretch_main", "nginx", "1.0"), hash: "" };

      const outcome = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [hashless],
        move: true,
      });

      expect(outcome.succeeded.slice(0, 2)).toEqual([
        { type: "package", action: "copied", ref: pkg("buster_main", "nginx", "1.0") },
        { type: "package", action: "removed", ref: pkg("stretch_main", "nginx", "1.0") },
      ]);
      expect(remote.repos.get("stretch_main")).toEqual([pkg("stretch_main", "curl", "7.0")]);
    });

    test("dry run copies nothing and refreshes nothing", async () => {
      const { ctx, remote } = setup({ repos: source });

      const outcome = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [pkg("stretch_main", "nginx", "1.0")],
        move: true,
        dryRun: true,
      });

      expect(outcome.status).toBe("success");
      expect(outcome.succeeded).toEqual([
        { type: "package", action: "copied", ref: pkg("buster_main", "nginx", "1.0") },
        { type: "package", action: "removed", ref: pkg("stretch_main", "nginx", "1.0") },
        { type: "publish", target: buster },
      ]);
      expect(remote.calls.map((call) => call.op)).toEqual(["listPublishes"]);
      expect(remote.repos.get("buster_main")).toEqual([]);
      expect(remote.refreshed).toEqual([]);
    });

    test("dry run still checks the signing setup", async () => {
      const { ctx, remote } = setup(
        { repos: source },
        { signing: { signing: { skip: false }, signingOverrides: {} } }
      );

      const error = await runCopy(ctx, {
        from: "stretch_main",
        to: "buster_main",
        refs: [pkg("stretch_main", "nginx", "1.0")],
        dryRun: true,
      }).catch((err: unknown) => err);

      expect(kindOf(error)).toBe("MissingSigningKey");
      expect(remote.calls).toEqual([]);
    });

    test("rejects copying a repo onto itself", async () => {
      const { ctx, remote } = setup({ repos: source });

      await expect(
        runCopy(ctx, { from: "stretch_main", to: "stretch_main", refs: [pkg("stretch_main", "a", "1")] })
      ).rejects.toThrow("Source and destination repo are the same: stretch_main");
      expect(remote.calls).toEqual([]);
    });
  });

  describe("runSearchWithRotation", () => {
    const repos = {
      stretch_main: [
        pkg("stretch_main", "aptly", "1.3.0"),
        pkg("stretch_main", "aptly", "1.5.0"),
        pkg("stretch_main", "aptly", "1.4.0"),
        pkg("stretch_main", "python", "3.6.5"),
      ],
      stretch_extra: [],
      buster_main: [pkg("buster_main", "aptly", "1.0.0"), pkg("buster_main", "aptly", "1.1.0")],
    };

    test("rotates each repo separately", async () => {
      const { ctx } = setup({ repos });

      const result = await runSearchWithRotation(ctx, {
        repos: ["stretch_main", "buster_main"],
        keep: 1,
      });

      expect(result.packages).toHaveLength(6);
      expect(result.retained).toEqual([
        pkg("stretch_main", "aptly", "1.5.0"),
        pkg("stretch_main", "python", "3.6.5"),
        pkg("buster_main", "aptly", "1.1.0"),
      ]);
      expect(result.surplus).toEqual([
        pkg("stretch_main", "aptly", "1.3.0"),
        pkg("stretch_main", "aptly", "1.4.0"),
        pkg("buster_main", "aptly", "1.0.0"),
      ]);
      expect(result.failed).toEqual([]);
    });

    test("retains everything without rotation and passes the query", async () => {
      const { ctx, remote } = setup({ repos });

      const result = await runSearchWithRotation(ctx, { repos: ["buster_main"], queries: ["aptly"] });

      expect(result.retained).toEqual(repos.buster_main);
      expect(result.surplus).toEqual([]);
      expect(remote.calls).toEqual([{ op: "searchRepo", args: ["buster_main", "aptly"] }]);
    });

    test("records a failing repo and keeps the others", async () => {
      const { ctx } = setup({ repos });

      const result = await runSearchWithRotation(ctx, { repos: ["nope", "buster_main"] });

      expect(result.packages).toEqual(repos.buster_main);
      expect(result.failed).toEqual([
        { item: "nope", kind: "RemoteCallFailed", message: "local repo with name nope not found" },
      ]);
    });

    test("searches every local repo, sorted, when none is given", async () => {
      const { ctx, remote } = setup({ repos });

      const result = await runSearchWithRotation(ctx, { repos: [], queries: ["aptly"] });

      expect(result.repos).toEqual(["buster_main", "stretch_extra", "stretch_main"]);
      expect(remote.calls.map((call) => call.args)).toEqual([
        [],
        ["buster_main", "aptly"],
        ["stretch_extra", "aptly"],
        ["stretch_main", "aptly"],
      ]);
      expect(result.packages).toEqual([
        pkg("buster_main", "aptly", "1.0.0"),
        pkg("buster_main", "aptly", "1.1.0"),
        pkg("stretch_main", "aptly", "1.3.0"),
        pkg("stretch_main", "aptly", "1.5.0"),
        pkg("stretch_main", "aptly", "1.4.0"),
      ]);
    });

    test("fails when the service has no local repos", async () => {
      const { ctx } = setup({ repos: {} });

      await expect(runSearchWithRotation(ctx, { repos: [] })).rejects.toThrow(
        "No repos given and the service has no local repos"
      );
    });

    test("wraps queries as name patterns", async () => {
      const { ctx, remote } = setup({ repos });

      const result = await runSearchWithRotation(ctx, {
        repos: ["stretch_main"],
        queries: ["^py"],
        byName: true,
      });

      expect(remote.calls).toEqual([{ op: "searchRepo", args: ["stretch_main", "Name (~ ^py)"] }]);
      expect(result.packages).toEqual([pkg("stretch_main", "python", "3.6.5")]);
    });

    test("runs each query over every repo and rotates per query", async () => {
      const { ctx } = setup({ repos });

      const result = await runSearchWithRotation(ctx, {
        repos: ["stretch_main", "buster_main"],
        queries: ["python", "aptly"],
        keep: 1,
      });

      expect(result.retained).toEqual([
        pkg("stretch_main", "python", "3.6.5"),
        pkg("stretch_main", "aptly", "1.5.0"),
        pkg("buster_main", "aptly", "1.1.0"),
      ]);
      expect(result.surplus).toEqual([
        pkg("stretch_main", "aptly", "1.3.0"),
        pkg("stretch_main", "aptly", "1.4.0"),
        pkg("buster_main", "aptly", "1.0.0"),
      ]);
    });

    test("labels failures with the query", async () => {
      const { ctx } = setup({ repos });

      const result = await runSearchWithRotation(ctx, { repos: ["nope"], queries: ["aptly"] });

      expect(result.failed).toEqual([
        { item: "nope (aptly)", kind: "RemoteCallFailed", message: "local repo with name nope not found" },
      ]);
    });

    test("needs a query to search by name", async () => {
      const { ctx, remote } = setup({ repos });

      await expect(runSearchWithRotation(ctx, { repos: [], byName: true })).rejects.toThrow(
        "Searching by name needs at least one query"
      );
      expect(remote.calls).toEqual([]);
    });

    test("rejects a negative rotation count before searching", async () => {
      const { ctx, remote } = setup({ repos });

      await expect(
        runSearchWithRotation(ctx, { repos: ["stretch_main"], keep: -1 })
      ).rejects.toThrow("Rotation count must be a non-negative integer, got -1");
      expect(remote.calls).toEqual([]);
    });
  });
});
