/**
 * aptly REST API client
 *
 * RemoteService implementation for an aptly API server.
 * All requests go through the injected HttpClient.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { HttpClient } from "#/core";
import { EngineError, errorMessage } from "#/errors";
import { ADDED_REPORT_REGEX } from "#/constants";
import {
  AptlyErrorBodySchema,
  AptlyFilesReportSchema,
  AptlyPackageKeysSchema,
  AptlyPublishListSchema,
  AptlyPublishSchema,
  AptlyRepoListSchema,
  AptlyRepoSchema,
  type AptlyPublish,
  type AptlyRepo,
} from "#/schemas";
import {
  computeFilesHash,
  describePackageFile,
  formatDirRef,
  formatPackageKey,
  formatRepoRef,
  parsePackageRef,
  withRepo,
  type PackageRef,
} from "#/packageRef";
import { escapePublishPrefix, publishKey, type PublishLocation, type PublishTarget } from "#/publish";
import { toSigningParams, type SigningConfig } from "#/signing";
import {
  isStagingHandle,
  type AddOptions,
  type NewPublish,
  type PackageArtifact,
  type RefreshOptions,
  type RemoteService,
  type RepoInfo,
  type RepoSettings,
  type StagingHandle,
} from "./remote.types";

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface RequestOptions {
  /** Label of the item the call is about, attached to errors */
  item: string;
  json?: unknown;
  form?: FormData;
  query?: Record<string, string>;
}

// aptly routes take ":" literally inside path segments
function encodeSegment(segment: string): string {
  return encodeURIComponent(segment).replace(/%3A/gi, ":");
}

export class AptlyClient implements RemoteService {
  private baseUrl: string;
  private http: HttpClient;

  constructor(url: string, http: HttpClient) {
    this.baseUrl = url.endsWith("/") ? url : `${url}/`;
    this.http = http;
  }

  private buildUrl(segments: string[], query?: Record<string, string>): string {
    const url = new URL(`api/${segments.map(encodeSegment).join("/")}`, this.baseUrl);
    for (const [name, value] of Object.entries(query ?? {})) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }

  private async request(
    method: HttpMethod,
    segments: string[],
    options: RequestOptions
  ): Promise<unknown> {
    const url = this.buildUrl(segments, options.query);
    const label = `${method} /api/${segments.join("/")}`;

    const init: RequestInit = { method };
    if (options.json !== undefined) {
      init.headers = { "Content-Type": "application/json" };
      init.body = JSON.stringify(options.json);
    } else if (options.form) {
      init.body = options.form;
    }

    let response: Response;
    try {
      response = await this.http.fetch(url, init);
    } catch (err) {
      throw new EngineError("RemoteCallFailed", `${label} failed: ${errorMessage(err)}`, {
        item: options.item,
        cause: err,
      });
    }

    const text = await response.text();

    if (!response.ok) {
      const detail = extractErrorMessage(text) ?? `${response.status} ${response.statusText}`.trim();
      throw new EngineError("RemoteCallFailed", `${label} failed: ${detail}`, {
        item: options.item,
        status: response.status,
      });
    }

    if (text.length === 0) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new EngineError("RemoteCallFailed", `${label} returned invalid JSON`, {
        item: options.item,
        status: response.status,
        cause: err,
      });
    }
  }

  private async requestParsed<T, Input>(
    method: HttpMethod,
    segments: string[],
    schema: ZodType<T, ZodTypeDef, Input>,
    options: RequestOptions
  ): Promise<T> {
    const body = await this.request(method, segments, options);
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new EngineError(
        "RemoteCallFailed",
        `Unexpected response from ${method} /api/${segments.join("/")}${where}: ${issue?.message ?? "invalid"}`,
        { item: options.item }
      );
    }
    return result.data;
  }

  async uploadPackage(dir: string, artifact: PackageArtifact): Promise<StagingHandle> {
    const file = describePackageFile(artifact.path, artifact.content);
    const form = new FormData();
    form.append("file", new Blob([artifact.content]), file.filename);

    await this.request("POST", ["files", dir], { item: artifact.path, form });

    return { dir, filename: file.filename, source: artifact.path, file };
  }

  async addToRepo(
    repo: string,
    source: StagingHandle | PackageRef,
    options: AddOptions = {}
  ): Promise<PackageRef> {
    if (isStagingHandle(source)) {
      return this.addUploadedFile(repo, source, options);
    }
    const ref = await this.withHash(source);
    await this.request("POST", ["repos", repo, "packages"], {
      item: formatRepoRef(withRepo(ref, repo)),
      json: { PackageRefs: [formatPackageKey(ref)] },
    });
    return withRepo(ref, repo);
  }

  private async addUploadedFile(
    repo: string,
    handle: StagingHandle,
    options: AddOptions
  ): Promise<PackageRef> {
    const report = await this.requestParsed(
      "POST",
      ["repos", repo, "file", handle.dir, handle.filename],
      AptlyFilesReportSchema,
      {
        item: handle.source,
        query: options.forceReplace ? { forceReplace: "1" } : undefined,
      }
    );

    const warnings = report.Report.Warnings;
    if (report.FailedFiles.length > 0) {
      throw new EngineError(
        "RemoteCallFailed",
        warnings[0] ?? `Failed to add ${handle.filename} to ${repo}`,
        { item: handle.source }
      );
    }

    const added = report.Report.Added.map((line) => ADDED_REPORT_REGEX.exec(line)).find(
      (match) => match !== null
    );
    if (!added) {
      throw new EngineError(
        "RemoteCallFailed",
        warnings[0] ?? `Nothing was added to ${repo} from ${handle.filename}`,
        { item: handle.source }
      );
    }

    const [, name = "", version = "", arch = ""] = added;
    return { repo, prefix: "", arch, name, version, hash: computeFilesHash(handle.file) };
  }

  async removeFromRepo(repo: string, ref: PackageRef): Promise<void> {
    const resolved = await this.withHash(withRepo(ref, repo));
    await this.request("DELETE", ["repos", repo, "packages"], {
      item: formatRepoRef(resolved),
      json: { PackageRefs: [formatPackageKey(resolved)] },
    });
  }

  async copyBetweenRepos(from: string, to: string, ref: PackageRef): Promise<PackageRef> {
    const resolved = await this.withHash(withRepo(ref, from));
    return this.addToRepo(to, resolved);
  }

  async listPublishes(): Promise<PublishTarget[]> {
    const publishes = await this.requestParsed("GET", ["publish"], AptlyPublishListSchema, {
      item: "publish list",
    });
    return publishes.map(toPublishTarget);
  }

  async refreshPublish(
    target: PublishLocation,
    signing: SigningConfig,
    options: RefreshOptions = {}
  ): Promise<void> {
    const json: Record<string, unknown> = { Signing: toSigningParams(signing) };
    if (options.forceOverwrite) {
      json.ForceOverwrite = true;
    }
    await this.request("PUT", ["publish", escapePublishPrefix(target), target.distribution], {
      item: publishKey(target),
      json,
    });
  }

  async createPublish(publish: NewPublish, signing: SigningConfig): Promise<PublishTarget> {
    const { location } = publish;
    const json: Record<string, unknown> = {
      SourceKind: publish.sourceKind,
      Sources: publish.sources.map((source) =>
        source.component ? { Name: source.name, Component: source.component } : { Name: source.name }
      ),
      Distribution: location.distribution,
      Signing: toSigningParams(signing),
    };
    if (publish.architectures && publish.architectures.length > 0) {
      json.Architectures = publish.architectures;
    }
    if (publish.label !== undefined) {
      json.Label = publish.label;
    }
    if (publish.origin !== undefined) {
      json.Origin = publish.origin;
    }
    if (publish.forceOverwrite) {
      json.ForceOverwrite = true;
    }

    const created = await this.requestParsed(
      "POST",
      ["publish", escapePublishPrefix(location)],
      AptlyPublishSchema,
      { item: publishKey(location), json }
    );
    return toPublishTarget(created);
  }

  async dropPublish(location: PublishLocation, force = false): Promise<void> {
    await this.request("DELETE", ["publish", escapePublishPrefix(location), location.distribution], {
      item: publishKey(location),
      query: force ? { force: "1" } : undefined,
    });
  }

  async listRepos(): Promise<RepoInfo[]> {
    const repos = await this.requestParsed("GET", ["repos"], AptlyRepoListSchema, { item: "repo list" });
    return repos.map(toRepoInfo);
  }

  async createRepo(name: string, settings: RepoSettings = {}): Promise<RepoInfo> {
    const created = await this.requestParsed("POST", ["repos"], AptlyRepoSchema, {
      item: name,
      json: { Name: name, ...toRepoFields(settings) },
    });
    return toRepoInfo(created);
  }

  async editRepo(name: string, settings: RepoSettings): Promise<RepoInfo> {
    const edited = await this.requestParsed("PUT", ["repos", name], AptlyRepoSchema, {
      item: name,
      json: toRepoFields(settings),
    });
    return toRepoInfo(edited);
  }

  async deleteRepo(name: string, force = false): Promise<void> {
    await this.request("DELETE", ["repos", name], {
      item: name,
      query: force ? { force: "1" } : undefined,
    });
  }

  async searchRepo(repo: string, query?: string): Promise<PackageRef[]> {
    const keys = await this.requestParsed(
      "GET",
      ["repos", repo, "packages"],
      AptlyPackageKeysSchema,
      { item: repo, query: query ? { q: query } : undefined }
    );
    return keys.map((key) => parsePackageRef(key, repo));
  }

  async deleteUploadDir(dir: string): Promise<void> {
    await this.request("DELETE", ["files", dir], { item: dir });
  }

  /**
   * Look up the files hash of a reference given by name, version and
   * architecture only. It must match exactly one package in its repo.
   */
  private async withHash(ref: PackageRef): Promise<PackageRef> {
    if (ref.hash) {
      return ref;
    }
    const query = `${ref.name} (= ${ref.version}) {${ref.arch}}`;
    const found = await this.searchRepo(ref.repo, query);
    const [match] = found;
    if (!match || found.length > 1) {
      const reason = found.length === 0 ? "not found" : `matched ${found.length} packages`;
      throw new EngineError(
        "RemoteCallFailed",
        `Package ${formatDirRef(ref)} ${reason} in repo ${ref.repo}`,
        { item: `${ref.repo}/${formatDirRef(ref)}` }
      );
    }
    return match;
  }
}

function extractErrorMessage(text: string): string | undefined {
  if (text.length === 0) {
    return undefined;
  }
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.trim() || undefined;
  }
  const parsed = AptlyErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  return Array.isArray(parsed.data) ? parsed.data[0].error : parsed.data.error;
}

function toPublishTarget(publish: AptlyPublish): PublishTarget {
  const target: PublishTarget = {
    prefix: publish.Prefix || ".",
    distribution: publish.Distribution,
    sourceKind: publish.SourceKind,
    // Snapshot publishes name snapshots, not repos
    sourceRepos: publish.SourceKind === "local" ? publish.Sources.map((source) => source.Name) : [],
  };
  return publish.Storage ? { ...target, storage: publish.Storage } : target;
}

function toRepoInfo(repo: AptlyRepo): RepoInfo {
  return {
    name: repo.Name,
    comment: repo.Comment,
    defaultDistribution: repo.DefaultDistribution,
    defaultComponent: repo.DefaultComponent,
  };
}

// Only the fields being set; aptly keeps the others
function toRepoFields(settings: RepoSettings): Record<string, string> {
  const fields: Record<string, string> = {};
  if (settings.comment !== undefined) fields.Comment = settings.comment;
  if (settings.defaultDistribution !== undefined) fields.DefaultDistribution = settings.defaultDistribution;
  if (settings.defaultComponent !== undefined) fields.DefaultComponent = settings.defaultComponent;
  return fields;
}
