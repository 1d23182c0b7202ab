import { describe, test, expect } from "vitest";
import { EngineError } from "#/errors";
import { createMockFileSystem } from "#/test-utils/mocks";
import {
  applyOverrides,
  findConfigFile,
  loadProfile,
  parseOverrides,
  selectProfile,
} from "./index";

const HOME = "/home/tester";
const CONFIG_PATH = `${HOME}/.config/debsync.yaml`;

const CONFIG = `
profiles:
  - name: production
    url: http://aptly.test:8090/
    signing:
      gpgKey: release@example.test
    signingOverrides:
      stretch:
        skip: true
      "s3:debian/buster":
        gpgKey: other@example.test
  - name: staging
    concurrency: 2
`;

describe("config", () => {
  describe("findConfigFile", () => {
    test("returns the first existing search path", () => {
      const fs = createMockFileSystem({
        "/etc/debsync.yaml": "",
        [CONFIG_PATH]: "",
      });

      expect(findConfigFile(fs, HOME)).toBe(CONFIG_PATH);
    });

    test("expands the home directory", () => {
      const fs = createMockFileSystem({ [`${HOME}/.debsync.yaml`]: "" });

      expect(findConfigFile(fs, HOME)).toBe(`${HOME}/.debsync.yaml`);
    });

    test("returns undefined when nothing exists", () => {
      expect(findConfigFile(createMockFileSystem(), HOME)).toBeUndefined();
    });
  });

  describe("selectProfile", () => {
    const names = ["production", "staging", "prod-eu"];

    test("defaults to the first profile", () => {
      expect(selectProfile(names)).toEqual({ success: true, data: 0 });
    });

    test("matches exact names", () => {
      expect(selectProfile(names, "staging")).toEqual({ success: true, data: 1 });
    });

    test("prefers an exact name over a prefix", () => {
      expect(selectProfile(["prod", "production"], "prod")).toEqual({ success: true, data: 0 });
    });

    test("matches a unique prefix", () => {
      expect(selectProfile(names, "prod-")).toEqual({ success: true, data: 2 });
    });

    test("rejects an ambiguous prefix", () => {
      expect(selectProfile(names, "prod")).toEqual({
        success: false,
        error: "Profile 'prod' is ambiguous: production, prod-eu",
      });
    });

    test("falls back to the index", () => {
      expect(selectProfile(names, "1")).toEqual({ success: true, data: 1 });
      expect(selectProfile(names, "7")).toEqual({ success: false, error: "Profile '7' not found" });
    });
  });

  describe("parseOverrides", () => {
    test("splits paths and coerces values", () => {
      expect(
        parseOverrides([
          "signing.gpgKey=release@example.test",
          "concurrency=8",
          "signing.skip=false",
          "url=http://aptly.test/?a=b",
        ])
      ).toEqual([
        { path: ["signing", "gpgKey"], value: "release@example.test" },
        { path: ["concurrency"], value: 8 },
        { path: ["signing", "skip"], value: false },
        { path: ["url"], value: "http://aptly.test/?a=b" },
      ]);
    });

    test("rejects pairs without a value", () => {
      expect(() => parseOverrides(["concurrency"])).toThrow(
        "Invalid config override 'concurrency', expected key.path=value"
      );
    });

    test("rejects empty path segments", () => {
      try {
        parseOverrides(["signing..skip=true"]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(EngineError);
        if (err instanceof EngineError) {
          expect(err.kind).toBe("InvalidArgument");
        }
      }
    });
  });

  describe("applyOverrides", () => {
    test("sets nested values without touching the input", () => {
      const raw = { name: "p", signing: { gpgKey: "a" } };

      const result = applyOverrides(raw, [
        { path: ["signing", "skip"], value: true },
        { path: ["signingOverrides", "stretch", "skip"], value: false },
      ]);

      expect(result).toEqual({
        name: "p",
        signing: { gpgKey: "a", skip: true },
        signingOverrides: { stretch: { skip: false } },
      });
      expect(raw).toEqual({ name: "p", signing: { gpgKey: "a" } });
    });
  });

  describe("loadProfile", () => {
    test("loads the first profile with defaults and normalized override keys", () => {
      const fs = createMockFileSystem({ [CONFIG_PATH]: CONFIG });

      expect(loadProfile(fs, { home: HOME })).toEqual({
        success: true,
        data: {
          configPath: CONFIG_PATH,
          profile: {
            name: "production",
            url: "http://aptly.test:8090/",
            timeoutMs: 30_000,
            concurrency: 4,
            signing: { gpgKey: "release@example.test" },
            signingOverrides: {
              "./stretch": { skip: true },
              "s3:debian/buster": { gpgKey: "other@example.test" },
            },
          },
        },
      });
    });

    test("selects by prefix and applies overrides", () => {
      const fs = createMockFileSystem({ [CONFIG_PATH]: CONFIG });

      const result = loadProfile(fs, {
        home: HOME,
        profile: "stag",
        overrides: parseOverrides(["concurrency=8"]),
      });

      expect(result.success && result.data.profile).toEqual({
        name: "staging",
        url: "http://localhost:8090/",
        timeoutMs: 30_000,
        concurrency: 8,
        signing: {},
        signingOverrides: {},
      });
    });

    test("builds a default profile when no config file exists", () => {
      const result = loadProfile(createMockFileSystem(), {
        home: HOME,
        overrides: parseOverrides(["url=http://aptly.test:8090/"]),
      });

      expect(result).toEqual({
        success: true,
        data: {
          profile: {
            name: "default",
            url: "http://aptly.test:8090/",
            timeoutMs: 30_000,
            concurrency: 4,
            signing: {},
            signingOverrides: {},
          },
        },
      });
    });

    test("fails for a named profile without a config file", () => {
      const result = loadProfile(createMockFileSystem(), { home: HOME, profile: "prod" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("profile");
        expect(result.error.message).toBe("Profile 'prod' not found");
      }
    });

    test("fails when an explicit config file is missing", () => {
      const result = loadProfile(createMockFileSystem(), { home: HOME, configPath: "/tmp/missing.yaml" });

      expect(result).toEqual({
        success: false,
        error: { type: "file", message: "Config file not found: /tmp/missing.yaml" },
      });
    });

    test("reports invalid values with their path", () => {
      const fs = createMockFileSystem({
        [CONFIG_PATH]: "profiles:\n  - name: p\n    concurrency: many\n",
      });

      const result = loadProfile(fs, { home: HOME });

      expect(result).toEqual({
        success: false,
        error: {
          type: "validation",
          message: `Invalid configuration in ${CONFIG_PATH}`,
          details: ["concurrency: Expected number, received string"],
        },
      });
    });

    test("requires at least one profile", () => {
      const fs = createMockFileSystem({ [CONFIG_PATH]: "profiles: []\n" });

      const result = loadProfile(fs, { home: HOME });

      expect(!result.success && result.error.details).toEqual([
        "profiles: At least one profile is required",
      ]);
    });

    test("rejects malformed override keys", () => {
      const fs = createMockFileSystem({
        [CONFIG_PATH]: "profiles:\n  - name: p\n    signingOverrides:\n      a/:\n        skip: true\n",
      });

      expect(loadProfile(fs, { home: HOME })).toEqual({
        success: false,
        error: {
          type: "validation",
          message: "Invalid signing override key 'a/'",
          details: ["Invalid publish spec 'a/'"],
        },
      });
    });

    test("rejects override keys naming the same publish twice", () => {
      const fs = createMockFileSystem({
        [CONFIG_PATH]:
          "profiles:\n  - name: p\n    signingOverrides:\n      stretch:\n        skip: true\n      ./stretch:\n        skip: false\n",
      });

      const result = loadProfile(fs, { home: HOME });

      expect(!result.success && result.error.message).toBe("Duplicate signing override for ./stretch");
    });
  });
});
