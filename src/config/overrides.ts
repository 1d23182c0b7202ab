import { EngineError } from "#/errors";
import type { ConfigOverride } from "./config.types";

function coerce(raw: string): string | number | boolean {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (/^-?\d+$/.test(raw)) return Number(raw);
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse "key.path=value" pairs. `true`, `false` and integers are coerced,
 * everything else stays a string.
 *
 * @example parseOverrides(["signing.gpgKey=release@example.test", "concurrency=8"])
 */
export function parseOverrides(pairs: readonly string[]): ConfigOverride[] {
  return pairs.map((pair) => {
    const eq = pair.indexOf("=");
    const key = eq === -1 ? "" : pair.slice(0, eq).trim();
    const path = key.split(".");
    if (eq === -1 || path.some((segment) => segment.length === 0)) {
      throw new EngineError("InvalidArgument", `Invalid config override '${pair}', expected key.path=value`, {
        item: pair,
      });
    }
    return { path, value: coerce(pair.slice(eq + 1)) };
  });
}

/**
 * Apply overrides to a raw profile object without touching the input.
 * Missing or non-object intermediate keys become objects.
 */
export function applyOverrides(
  target: Record<string, unknown>,
  overrides: readonly ConfigOverride[]
): Record<string, unknown> {
  const root: Record<string, unknown> = structuredClone(target);
  for (const { path, value } of overrides) {
    let node = root;
    path.forEach((segment, index) => {
      if (index === path.length - 1) {
        node[segment] = value;
        return;
      }
      const child = node[segment];
      const next = isRecord(child) ? child : {};
      node[segment] = next;
      node = next;
    });
  }
  return root;
}
