/**
 * Package reference types
 */

/**
 * One package build in one local repository.
 * `hash` is aptly's files hash; empty when the reference was given by
 * name, version and architecture only.
 */
export interface PackageRef {
  readonly repo: string;
  readonly prefix: string;
  readonly arch: string;
  readonly name: string;
  readonly version: string;
  readonly hash: string;
}

/**
 * Checksums of a package file, as aptly records them
 */
export interface PackageFileInfo {
  filename: string;
  size: number;
  md5: string;
  sha1: string;
  sha256: string;
}
