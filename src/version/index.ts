/**
 * Version module
 *
 * Debian version parsing and comparison.
 */

export {
  parseVersion,
  isValidVersion,
  compareVersions,
  compareParsedVersions,
  sortVersionsDesc,
  getHighestVersion,
  isGreaterThan,
  isLessThan,
  type Ordering,
  type ParsedVersion,
} from "./version";
