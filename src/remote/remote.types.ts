/**
 * Remote service types
 *
 * The engine never knows it is talking to aptly over HTTP, only that there
 * is "a remote service" with these operations. Every operation rejects
 * with an EngineError of kind RemoteCallFailed.
 */

import type { PackageFileInfo, PackageRef } from "#/packageRef";
import type { PublishLocation, PublishSourceKind, PublishTarget } from "#/publish";
import type { SigningConfig } from "#/signing";

/**
 * A local package file to upload
 */
export interface PackageArtifact {
  path: string;
  content: Buffer;
}

/**
 * An uploaded file waiting in the service's upload area
 */
export interface StagingHandle {
  dir: string;
  filename: string;
  /** Local path the file was read from */
  source: string;
  file: PackageFileInfo;
}

export interface AddOptions {
  /** Replace packages that conflict with the added one */
  forceReplace?: boolean;
}

/**
 * A local repo and its publishing defaults
 */
export interface RepoInfo {
  name: string;
  comment: string;
  defaultDistribution: string;
  defaultComponent: string;
}

/**
 * Repo fields to set; unset fields are left as they are
 */
export type RepoSettings = Partial<Omit<RepoInfo, "name">>;

export interface PublishSource {
  /** Local repo or snapshot name */
  name: string;
  /** Component to publish it as; the source's default when unset */
  component?: string;
}

export interface NewPublish {
  location: PublishLocation;
  sourceKind: PublishSourceKind;
  sources: PublishSource[];
  architectures?: string[];
  label?: string;
  origin?: string;
  /** Overwrite conflicting files in the pool */
  forceOverwrite?: boolean;
}

export interface RefreshOptions {
  forceOverwrite?: boolean;
}

export interface RemoteService {
  uploadPackage(dir: string, artifact: PackageArtifact): Promise<StagingHandle>;
  addToRepo(repo: string, source: StagingHandle | PackageRef, options?: AddOptions): Promise<PackageRef>;
  removeFromRepo(repo: string, ref: PackageRef): Promise<void>;
  copyBetweenRepos(from: string, to: string, ref: PackageRef): Promise<PackageRef>;
  listPublishes(): Promise<PublishTarget[]>;
  refreshPublish(target: PublishLocation, signing: SigningConfig, options?: RefreshOptions): Promise<void>;
  searchRepo(repo: string, query?: string): Promise<PackageRef[]>;
  deleteUploadDir(dir: string): Promise<void>;

  listRepos(): Promise<RepoInfo[]>;
  createRepo(name: string, settings?: RepoSettings): Promise<RepoInfo>;
  editRepo(name: string, settings: RepoSettings): Promise<RepoInfo>;
  /** `force` deletes the repo even when snapshots were taken from it */
  deleteRepo(name: string, force?: boolean): Promise<void>;
  createPublish(publish: NewPublish, signing: SigningConfig): Promise<PublishTarget>;
  /** `force` drops the publish even when it is referenced */
  dropPublish(location: PublishLocation, force?: boolean): Promise<void>;
}

export function isStagingHandle(source: StagingHandle | PackageRef): source is StagingHandle {
  return "dir" in source && "filename" in source;
}
