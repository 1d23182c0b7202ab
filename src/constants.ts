/**
 * Global constants for the debsync engine
 */

export const DEFAULT_API_URL = "http://localhost:8090/";

// Parallel in-flight remote calls per stage
export const DEFAULT_CONCURRENCY = 4;

export const DEFAULT_TIMEOUT_MS = 30_000;

export const CONFIG_FILENAME = "debsync.yaml";

// Searched in order when --config is not given. "~" is the user's home.
export const CONFIG_SEARCH_PATHS = [
  `~/.config/${CONFIG_FILENAME}`,
  `~/.${CONFIG_FILENAME}`,
  `/etc/${CONFIG_FILENAME}`,
] as const;

// aptly package key: "[<prefix>]P<arch> <name> <version>[ <hash>]"
export const PACKAGE_KEY_REGEX = /^(\w*?)P(\w+) (\S+) (\S+)(?: (\w+))?$/;

// Direct reference: "<name>_<version>_<arch>"
export const DIR_REF_REGEX = /^(\S+)_([A-Za-z0-9.+:~-]+)_(\w+)$/;

// Entry of an add report: "<name>_<version>_<arch> added"
export const ADDED_REPORT_REGEX = /^(\S+)_([A-Za-z0-9.+:~-]+)_(\w+) added$/;

// Publish prefix meaning "no prefix"
export const ROOT_PREFIX = ".";
