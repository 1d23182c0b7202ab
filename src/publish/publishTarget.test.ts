import { describe, test, expect } from "vitest";
import { EngineError } from "#/errors";
import { fullPrefix, publishKey, parsePublishSpec, escapePublishPrefix } from "./publishTarget";

describe("publishTarget", () => {
  describe("publishKey", () => {
    test("uses the root prefix when empty", () => {
      expect(publishKey({ prefix: "", distribution: "stretch" })).toBe("./stretch");
      expect(publishKey({ prefix: ".", distribution: "stretch" })).toBe("./stretch");
    });

    test("includes storage", () => {
      expect(publishKey({ storage: "s3:bucket", prefix: "debian", distribution: "buster" })).toBe(
        "s3:bucket:debian/buster"
      );
    });
  });

  describe("parsePublishSpec", () => {
    test("bare distribution lives under the root prefix", () => {
      expect(parsePublishSpec("stretch")).toEqual({ prefix: ".", distribution: "stretch" });
    });

    test("splits prefix at the last slash", () => {
      expect(parsePublishSpec("debian/main/stretch")).toEqual({
        prefix: "debian/main",
        distribution: "stretch",
      });
    });

    test("splits storage at the last colon", () => {
      expect(parsePublishSpec("s3:bucket:debian/stretch")).toEqual({
        storage: "s3:bucket",
        prefix: "debian",
        distribution: "stretch",
      });
    });

    test("round-trips through publishKey", () => {
      for (const spec of ["./stretch", "debian/stretch", "filesystem:pub:./buster"]) {
        expect(publishKey(parsePublishSpec(spec))).toBe(spec);
      }
    });

    test("rejects empty parts", () => {
      expect(() => parsePublishSpec("")).toThrow(EngineError);
      expect(() => parsePublishSpec("debian/")).toThrow("Invalid publish spec 'debian/'");
      expect(() => parsePublishSpec("/stretch")).toThrow(EngineError);
      expect(() => parsePublishSpec(":debian/stretch")).toThrow(EngineError);
    });
  });

  describe("escapePublishPrefix", () => {
    test("escapes the root prefix", () => {
      expect(escapePublishPrefix({ prefix: ".", distribution: "x" })).toBe(":.");
    });

    test("doubles underscores and replaces slashes", () => {
      expect(escapePublishPrefix({ prefix: "my_repo/debian", distribution: "x" })).toBe(
        "my__repo_debian"
      );
    });

    test("keeps storage", () => {
      expect(escapePublishPrefix({ storage: "s3", prefix: "debian", distribution: "x" })).toBe(
        "s3:debian"
      );
      expect(fullPrefix({ storage: "s3", prefix: "", distribution: "x" })).toBe("s3:.");
    });
  });
});
