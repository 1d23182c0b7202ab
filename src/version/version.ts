/**
 * Version utilities
 *
 * Debian package version parsing and ordering.
 * Versions have the form [epoch:]upstream-version[-debian-revision] and are
 * ordered the way dpkg orders them.
 */

import { EngineError } from "#/errors";

export type Ordering = -1 | 0 | 1;

export interface ParsedVersion {
  /** Original version string */
  raw: string;
  epoch: bigint;
  upstream: string;
  /** Empty string when the version has no revision */
  revision: string;
}

const VERSION_CHARS_REGEX = /^[A-Za-z0-9.+~:-]+$/;
const EPOCH_REGEX = /^[0-9]+$/;
const REVISION_CHARS_REGEX = /^[A-Za-z0-9.+~]*$/;

function invalid(version: string, reason: string): EngineError {
  return new EngineError("InvalidVersion", `Invalid version '${version}': ${reason}`, {
    item: version,
  });
}

/**
 * Split a version into epoch, upstream version and revision.
 * Throws InvalidVersion for malformed strings.
 *
 * @example parseVersion("1:2.0-3") → { epoch: 1n, upstream: "2.0", revision: "3" }
 * @example parseVersion("2.0") → { epoch: 0n, upstream: "2.0", revision: "" }
 */
export function parseVersion(version: string): ParsedVersion {
  if (version.length === 0) {
    throw invalid(version, "version is empty");
  }
  if (!VERSION_CHARS_REGEX.test(version)) {
    const position = [...version].findIndex((c) => !VERSION_CHARS_REGEX.test(c));
    throw invalid(version, `illegal character at position ${position}`);
  }

  const colon = version.indexOf(":");
  const epoch = colon === -1 ? "0" : version.slice(0, colon);
  const rest = colon === -1 ? version : version.slice(colon + 1);

  if (!EPOCH_REGEX.test(epoch)) {
    throw invalid(version, `epoch '${epoch}' is not a number`);
  }

  const dash = rest.lastIndexOf("-");
  const upstream = dash === -1 ? rest : rest.slice(0, dash);
  const revision = dash === -1 ? "" : rest.slice(dash + 1);

  if (!/^[0-9]/.test(upstream)) {
    throw invalid(version, "upstream version must start with a digit");
  }
  if (dash !== -1 && revision.length === 0) {
    throw invalid(version, "debian revision is empty");
  }
  if (!REVISION_CHARS_REGEX.test(revision)) {
    throw invalid(version, `debian revision '${revision}' contains illegal characters`);
  }

  return { raw: version, epoch: BigInt(epoch), upstream, revision };
}

/**
 * Check if a string is a valid Debian version.
 */
export function isValidVersion(version: string): boolean {
  try {
    parseVersion(version);
    return true;
  } catch {
    return false;
  }
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

function isLetter(code: number): boolean {
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

/**
 * Sort weight of a character inside a non-digit run.
 * NaN (past the end of the run) weighs 0, `~` sorts below it,
 * letters sort below every other symbol.
 */
function weight(code: number): number {
  if (Number.isNaN(code)) return 0;
  if (code === 126) return -1;
  if (isLetter(code)) return code;
  return code + 256;
}

function compareNonDigits(a: string, b: string): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = weight(a.charCodeAt(i)) - weight(b.charCodeAt(i));
    if (diff !== 0) return diff;
  }
  return 0;
}

function compareDigits(a: string, b: string): number {
  const left = a.replace(/^0+/, "");
  const right = b.replace(/^0+/, "");
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function takeRun(s: string, start: number, digits: boolean): number {
  let end = start;
  while (end < s.length && isDigit(s.charCodeAt(end)) === digits) {
    end++;
  }
  return end;
}

/**
 * Compare an upstream version or a revision: alternate non-digit and digit
 * runs from the left until one of them differs.
 */
function compareFragment(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    const aText = takeRun(a, i, false);
    const bText = takeRun(b, j, false);
    const textDiff = compareNonDigits(a.slice(i, aText), b.slice(j, bText));
    if (textDiff !== 0) return textDiff;

    const aNum = takeRun(a, aText, true);
    const bNum = takeRun(b, bText, true);
    const numDiff = compareDigits(a.slice(aText, aNum), b.slice(bText, bNum));
    if (numDiff !== 0) return numDiff;

    i = aNum;
    j = bNum;
  }

  return 0;
}

function sign(n: number): Ordering {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Compare two parsed versions.
 */
export function compareParsedVersions(a: ParsedVersion, b: ParsedVersion): Ordering {
  if (a.epoch !== b.epoch) {
    return a.epoch < b.epoch ? -1 : 1;
  }
  const upstream = compareFragment(a.upstream, b.upstream);
  if (upstream !== 0) {
    return sign(upstream);
  }
  return sign(compareFragment(a.revision, b.revision));
}

/**
 * Compare two Debian versions.
 * Returns -1 if a < b, 0 if a and b are equal, 1 if a > b.
 * Throws InvalidVersion if either version is malformed.
 *
 * @example compareVersions("1.0~rc1", "1.0") → -1
 * @example compareVersions("1:0.9", "2.0") → 1
 */
export function compareVersions(a: string, b: string): Ordering {
  return compareParsedVersions(parseVersion(a), parseVersion(b));
}

/**
 * Sort versions in descending order (highest first).
 * Invalid versions are filtered out.
 */
export function sortVersionsDesc(versions: string[]): string[] {
  return versions
    .filter(isValidVersion)
    .map(parseVersion)
    .sort((a, b) => compareParsedVersions(b, a))
    .map((parsed) => parsed.raw);
}

/**
 * Get the highest version from a list.
 * Returns null if the list is empty or has no valid versions.
 */
export function getHighestVersion(versions: string[]): string | null {
  return sortVersionsDesc(versions)[0] ?? null;
}

/**
 * Check if version a is greater than version b.
 */
export function isGreaterThan(a: string, b: string): boolean {
  return compareVersions(a, b) > 0;
}

/**
 * Check if version a is less than version b.
 */
export function isLessThan(a: string, b: string): boolean {
  return compareVersions(a, b) < 0;
}
