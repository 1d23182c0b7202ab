/**
 * Profile loading
 *
 * Find the config file, pick a profile, merge command-line overrides and
 * validate the result.
 */

import type { FileSystem } from "#/core";
import { CONFIG_SEARCH_PATHS } from "#/constants";
import { errorMessage } from "#/errors";
import { safeParseYaml, safeValidate, type ParseResult } from "#/friendly-errors";
import { parsePublishSpec, publishKey } from "#/publish";
import { ConfigFileSchema, ProfileSchema, type Profile } from "#/schemas";
import { applyOverrides } from "./overrides";
import type { LoadedProfile, LoadProfileOptions } from "./config.types";

function expandHome(path: string, home: string): string {
  return path.startsWith("~/") ? `${home}${path.slice(1)}` : path;
}

/**
 * First existing config file from the search paths
 */
export function findConfigFile(fs: FileSystem, home: string): string | undefined {
  return CONFIG_SEARCH_PATHS.map((path) => expandHome(path, home)).find((path) => fs.exists(path));
}

/**
 * Index of the profile `selector` names: exact name, then a name prefix
 * matching exactly one profile, then a numeric index. Default is the first.
 */
export function selectProfile(
  names: readonly string[],
  selector?: string
): { success: true; data: number } | { success: false; error: string } {
  if (selector === undefined || selector === "") {
    return { success: true, data: 0 };
  }

  const exact = names.indexOf(selector);
  if (exact !== -1) {
    return { success: true, data: exact };
  }

  const prefixed = names.flatMap((name, index) => (name.startsWith(selector) ? [index] : []));
  const [only] = prefixed;
  if (prefixed.length === 1 && only !== undefined) {
    return { success: true, data: only };
  }
  if (prefixed.length > 1) {
    const matches = prefixed.map((index) => names[index]).join(", ");
    return { success: false, error: `Profile '${selector}' is ambiguous: ${matches}` };
  }

  if (/^\d+$/.test(selector)) {
    const index = Number(selector);
    if (index < names.length) {
      return { success: true, data: index };
    }
  }

  return { success: false, error: `Profile '${selector}' not found` };
}

/**
 * Rewrite override keys to their normalized publish key, so "stretch" and
 * "./stretch" name the same publish.
 */
export function normalizeSigningOverrides(profile: Profile): ParseResult<Profile> {
  const signingOverrides: Profile["signingOverrides"] = {};
  for (const [spec, override] of Object.entries(profile.signingOverrides)) {
    let key: string;
    try {
      key = publishKey(parsePublishSpec(spec));
    } catch (err) {
      return {
        success: false,
        error: { type: "validation", message: `Invalid signing override key '${spec}'`, details: [errorMessage(err)] },
      };
    }
    if (Object.hasOwn(signingOverrides, key)) {
      return {
        success: false,
        error: { type: "validation", message: `Duplicate signing override for ${key}` },
      };
    }
    signingOverrides[key] = override;
  }
  return { success: true, data: { ...profile, signingOverrides } };
}

function finishProfile(raw: Record<string, unknown>, options: LoadProfileOptions, configPath?: string): ParseResult<LoadedProfile> {
  const merged = applyOverrides(raw, options.overrides ?? []);
  const validated = safeValidate(merged, ProfileSchema, configPath);
  if (!validated.success) {
    return validated;
  }
  const normalized = normalizeSigningOverrides(validated.data);
  if (!normalized.success) {
    return normalized;
  }
  return { success: true, data: { profile: normalized.data, configPath } };
}

/**
 * Load the active profile. Without any config file a "default" profile is
 * built from defaults and overrides.
 */
export function loadProfile(fs: FileSystem, options: LoadProfileOptions): ParseResult<LoadedProfile> {
  const configPath = options.configPath
    ? expandHome(options.configPath, options.home)
    : findConfigFile(fs, options.home);

  if (options.configPath && configPath && !fs.exists(configPath)) {
    return {
      success: false,
      error: { type: "file", message: `Config file not found: ${options.configPath}` },
    };
  }

  if (!configPath) {
    if (options.profile !== undefined && options.profile !== "default" && options.profile !== "0") {
      return {
        success: false,
        error: { type: "profile", message: `Profile '${options.profile}' not found`, details: ["No config file found"] },
      };
    }
    return finishProfile({ name: "default" }, options);
  }

  let content: string;
  try {
    content = fs.readFile(configPath);
  } catch (err) {
    return {
      success: false,
      error: { type: "file", message: `Cannot read config file ${configPath}`, details: [errorMessage(err)] },
    };
  }

  const parsed = safeParseYaml(content, ConfigFileSchema, configPath);
  if (!parsed.success) {
    return parsed;
  }

  const { profiles } = parsed.data;
  const selected = selectProfile(
    profiles.map((profile) => profile.name),
    options.profile
  );
  if (!selected.success) {
    return { success: false, error: { type: "profile", message: selected.error } };
  }

  const raw = profiles[selected.data];
  if (!raw) {
    return { success: false, error: { type: "profile", message: `Profile '${options.profile}' not found` } };
  }
  return finishProfile(raw, options, configPath);
}
