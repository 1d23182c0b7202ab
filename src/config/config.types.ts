import type { Profile } from "#/schemas";

/**
 * One `-C key.path=value` override
 */
export interface ConfigOverride {
  path: string[];
  value: string | number | boolean;
}

export interface LoadProfileOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Profile name, unambiguous name prefix or index */
  profile?: string;
  overrides?: ConfigOverride[];
  /** Home directory used to expand "~" in search paths */
  home: string;
}

export interface LoadedProfile {
  profile: Profile;
  /** Config file the profile came from; undefined when built from defaults */
  configPath?: string;
}
