/**
 * Repo and publish administration types
 */

import type { PublishSourceKind } from "#/publish";
import type { RepoSettings } from "#/remote";
import type { SyncContext } from "#/sync";

export type ManageContext = Pick<SyncContext, "remote" | "events" | "signing">;

export interface CreateRepoInput {
  name: string;
  settings?: RepoSettings;
}

export interface EditRepoInput {
  name: string;
  settings: RepoSettings;
}

export interface DeleteRepoInput {
  name: string;
  /** Delete even when snapshots were taken from the repo */
  force?: boolean;
}

export interface CreatePublishInput {
  /** "[storage:]prefix/distribution" */
  spec: string;
  sourceKind: PublishSourceKind;
  /** "name" or "name=component" */
  sources: string[];
  architectures?: string[];
  label?: string;
  origin?: string;
  forceOverwrite?: boolean;
}

export interface UpdatePublishInput {
  spec: string;
  forceOverwrite?: boolean;
}

export interface DropPublishInput {
  spec: string;
  force?: boolean;
}
