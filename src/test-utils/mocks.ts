/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { EngineEvent, EventSink, FileSystem, HttpClient } from "#/core";
import { EngineError } from "#/errors";
import {
  computeFilesHash,
  describePackageFile,
  isSamePackage,
  withRepo,
  type PackageRef,
} from "#/packageRef";
import { publishKey, type PublishLocation, type PublishTarget } from "#/publish";
import {
  isStagingHandle,
  type NewPublish,
  type PackageArtifact,
  type RefreshOptions,
  type RemoteService,
  type RepoInfo,
  type RepoSettings,
  type StagingHandle,
} from "#/remote";
import type { SigningConfig } from "#/signing";
import { basename } from "path";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, string | Buffer> } {
  const files = new Map<string, string | Buffer>(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof content === "string" ? content : content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof content === "string" ? Buffer.from(content) : content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  /** JSON or text body as sent */
  body?: string;
  form?: FormData;
}

type MockResponse = Response | Error | (() => Response);

/**
 * Create a mock HttpClient with predefined responses, keyed by
 * "<METHOD> <url>". Unknown requests get a 404. An Error value is thrown
 * as a transport failure.
 */
export function createMockHttpClient(
  responses: Map<string, MockResponse> = new Map()
): HttpClient & { responses: Map<string, MockResponse>; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options: RequestInit = {}): Promise<Response> {
      const method = options.method ?? "GET";
      const headers: Record<string, string> = {};
      new Headers(options.headers).forEach((value, name) => {
        headers[name] = value;
      });
      requests.push({
        method,
        url,
        headers,
        body: typeof options.body === "string" ? options.body : undefined,
        form: options.body instanceof FormData ? options.body : undefined,
      });

      const response = responses.get(`${method} ${url}`);
      if (response === undefined) {
        return new Response(null, { status: 404, statusText: "Not Found" });
      }
      if (response instanceof Error) {
        throw response;
      }
      return typeof response === "function" ? response() : response;
    },
  };
}

/**
 * Create an EventSink that keeps every event
 */
export function createMemorySink(): EventSink & {
  events: EngineEvent[];
  ofType(type: string): EngineEvent[];
} {
  const events: EngineEvent[] = [];
  return {
    events,
    emit(event: EngineEvent): void {
      events.push(event);
    },
    ofType(type: string): EngineEvent[] {
      return events.filter((event) => event.type === type);
    },
  };
}

export interface FakeRemoteCall {
  op: keyof RemoteService;
  args: string[];
}

export interface FakeRemoteOptions {
  repos?: Record<string, PackageRef[]>;
  publishes?: PublishTarget[];
  /** Artifact paths whose upload fails */
  failUploads?: string[];
  /** Labels ("<repo>/<name>" or publish keys) whose mutation fails */
  failItems?: string[];
  failListPublishes?: boolean;
  failCleanup?: boolean;
  /** Repo settings by name; repos without an entry get empty settings */
  repoSettings?: Record<string, RepoSettings>;
}

function remoteError(message: string, item: string, status = 500): EngineError {
  return new EngineError("RemoteCallFailed", message, { item, status });
}

/**
 * The subset of aptly queries the fake understands: "Name (~ regex)",
 * "name (= version) {arch}", or a bare package name.
 */
export function matchesQuery(ref: PackageRef, query: string): boolean {
  const byName = /^Name \(~ (.+)\)$/.exec(query);
  if (byName) {
    return new RegExp(byName[1] ?? "").test(ref.name);
  }
  const exact = /^(\S+) \(= (\S+)\) \{(\S+)\}$/.exec(query);
  if (exact) {
    return ref.name === exact[1] && ref.version === exact[2] && ref.arch === exact[3];
  }
  return ref.name === query;
}

/**
 * In-memory RemoteService. Uploaded files are named
 * "<name>_<version>_<arch>.deb" and identified from their filename.
 */
export function createFakeRemote(options: FakeRemoteOptions = {}): RemoteService & {
  repos: Map<string, PackageRef[]>;
  repoSettings: Map<string, RepoSettings>;
  publishes: PublishTarget[];
  calls: FakeRemoteCall[];
  refreshed: { key: string; signing: SigningConfig; forceOverwrite: boolean }[];
  uploadDirs: Set<string>;
} {
  const repos = new Map<string, PackageRef[]>(
    Object.entries(options.repos ?? {}).map(([name, refs]) => [name, [...refs]])
  );
  const repoSettings = new Map<string, RepoSettings>(Object.entries(options.repoSettings ?? {}));
  const publishes = [...(options.publishes ?? [])];
  const failUploads = new Set(options.failUploads ?? []);
  const failItems = new Set(options.failItems ?? []);
  const calls: FakeRemoteCall[] = [];
  const refreshed: { key: string; signing: SigningConfig; forceOverwrite: boolean }[] = [];
  const uploadDirs = new Set<string>();

  const packagesOf = (repo: string): PackageRef[] => {
    const list = repos.get(repo);
    if (!list) {
      throw remoteError(`local repo with name ${repo} not found`, repo);
    }
    return list;
  };

  const add = (repo: string, ref: PackageRef): PackageRef => {
    if (failItems.has(`${repo}/${ref.name}`)) {
      throw remoteError(`Unable to add ${ref.name} to ${repo}`, `${repo}/${ref.name}`);
    }
    const list = packagesOf(repo);
    if (list.some((existing) => isSamePackage(existing, ref))) {
      throw remoteError(`Package ${ref.name}_${ref.version}_${ref.arch} already exists in ${repo}`, repo);
    }
    const added = withRepo(ref, repo);
    list.push(added);
    return added;
  };

  const remove = (repo: string, ref: PackageRef): void => {
    if (failItems.has(`${repo}/${ref.name}`)) {
      throw remoteError(`Unable to remove ${ref.name} from ${repo}`, `${repo}/${ref.name}`);
    }
    const list = packagesOf(repo);
    const index = list.findIndex((existing) => isSamePackage(existing, ref));
    if (index === -1) {
      throw remoteError(`Package ${ref.name} not found in ${repo}`, repo);
    }
    list.splice(index, 1);
  };

  // Hashless references resolve to the single matching build, as aptly's
  // client does before mutating
  const resolve = (repo: string, ref: PackageRef): PackageRef => {
    const candidates = packagesOf(repo).filter((existing) =>
      ref.hash
        ? isSamePackage(existing, ref)
        : existing.name === ref.name && existing.version === ref.version && existing.arch === ref.arch
    );
    const [match] = candidates;
    if (!match || candidates.length > 1) {
      throw remoteError(`Package ${ref.name} not found in ${repo}`, repo);
    }
    return match;
  };

  const repoInfo = (name: string): RepoInfo => {
    const settings = repoSettings.get(name) ?? {};
    return {
      name,
      comment: settings.comment ?? "",
      defaultDistribution: settings.defaultDistribution ?? "",
      defaultComponent: settings.defaultComponent ?? "",
    };
  };

  const publishIndex = (location: PublishLocation): number =>
    publishes.findIndex((publish) => publishKey(publish) === publishKey(location));

  return {
    repos,
    repoSettings,
    publishes,
    calls,
    refreshed,
    uploadDirs,

    async uploadPackage(dir: string, artifact: PackageArtifact): Promise<StagingHandle> {
      calls.push({ op: "uploadPackage", args: [dir, artifact.path] });
      if (failUploads.has(artifact.path)) {
        throw remoteError(`Upload of ${artifact.path} failed`, artifact.path);
      }
      uploadDirs.add(dir);
      const file = describePackageFile(artifact.path, artifact.content);
      return { dir, filename: file.filename, source: artifact.path, file };
    },

    async addToRepo(repo: string, source: StagingHandle | PackageRef): Promise<PackageRef> {
      if (isStagingHandle(source)) {
        calls.push({ op: "addToRepo", args: [repo, source.filename] });
        const [name = "", version = "", arch = ""] = basename(source.filename, ".deb").split("_");
        return add(repo, { repo, prefix: "", arch, name, version, hash: computeFilesHash(source.file) });
      }
      calls.push({ op: "addToRepo", args: [repo, source.name] });
      return add(repo, source);
    },

    async removeFromRepo(repo: string, ref: PackageRef): Promise<void> {
      calls.push({ op: "removeFromRepo", args: [repo, ref.name] });
      remove(repo, ref);
    },

    async copyBetweenRepos(from: string, to: string, ref: PackageRef): Promise<PackageRef> {
      calls.push({ op: "copyBetweenRepos", args: [from, to, ref.name] });
      return add(to, resolve(from, ref));
    },

    async listPublishes(): Promise<PublishTarget[]> {
      calls.push({ op: "listPublishes", args: [] });
      if (options.failListPublishes) {
        throw remoteError("publish list unavailable", "publish list");
      }
      return publishes;
    },

    async refreshPublish(
      target: PublishLocation,
      signing: SigningConfig,
      refreshOptions: RefreshOptions = {}
    ): Promise<void> {
      const key = publishKey(target);
      calls.push({ op: "refreshPublish", args: [key] });
      if (failItems.has(key)) {
        throw remoteError(`Unable to update ${key}`, key);
      }
      if (publishIndex(target) === -1) {
        throw remoteError(`published repo with prefix/distribution ${key} not found`, key, 404);
      }
      refreshed.push({ key, signing, forceOverwrite: refreshOptions.forceOverwrite ?? false });
    },

    async searchRepo(repo: string, query?: string): Promise<PackageRef[]> {
      calls.push({ op: "searchRepo", args: query ? [repo, query] : [repo] });
      const list = packagesOf(repo);
      return query ? list.filter((ref) => matchesQuery(ref, query)) : [...list];
    },

    async listRepos(): Promise<RepoInfo[]> {
      calls.push({ op: "listRepos", args: [] });
      return [...repos.keys()].map(repoInfo);
    },

    async createRepo(name: string, settings: RepoSettings = {}): Promise<RepoInfo> {
      calls.push({ op: "createRepo", args: [name] });
      if (repos.has(name)) {
        throw remoteError(`local repo with name ${name} already exists`, name, 400);
      }
      repos.set(name, []);
      repoSettings.set(name, settings);
      return repoInfo(name);
    },

    async editRepo(name: string, settings: RepoSettings): Promise<RepoInfo> {
      calls.push({ op: "editRepo", args: [name] });
      if (!repos.has(name)) {
        throw remoteError(`local repo with name ${name} not found`, name, 404);
      }
      repoSettings.set(name, { ...repoSettings.get(name), ...settings });
      return repoInfo(name);
    },

    async deleteRepo(name: string, force = false): Promise<void> {
      calls.push({ op: "deleteRepo", args: force ? [name, "force"] : [name] });
      if (!repos.has(name)) {
        throw remoteError(`local repo with name ${name} not found`, name, 404);
      }
      if (publishes.some((publish) => publish.sourceRepos.includes(name))) {
        throw remoteError("unable to drop, local repo is published", name, 409);
      }
      repos.delete(name);
      repoSettings.delete(name);
    },

    async createPublish(publish: NewPublish, signing: SigningConfig): Promise<PublishTarget> {
      const key = publishKey(publish.location);
      calls.push({ op: "createPublish", args: [key] });
      if (publishIndex(publish.location) !== -1) {
        throw remoteError(`prefix/distribution ${key} is already used by another published repo`, key, 400);
      }
      const created: PublishTarget = {
        ...publish.location,
        sourceKind: publish.sourceKind,
        sourceRepos: publish.sourceKind === "local" ? publish.sources.map((source) => source.name) : [],
      };
      publishes.push(created);
      refreshed.push({ key, signing, forceOverwrite: publish.forceOverwrite ?? false });
      return created;
    },

    async dropPublish(location: PublishLocation, force = false): Promise<void> {
      const key = publishKey(location);
      calls.push({ op: "dropPublish", args: force ? [key, "force"] : [key] });
      const index = publishIndex(location);
      if (index === -1) {
        throw remoteError(`published repo with prefix/distribution ${key} not found`, key, 404);
      }
      publishes.splice(index, 1);
    },

    async deleteUploadDir(dir: string): Promise<void> {
      calls.push({ op: "deleteUploadDir", args: [dir] });
      if (options.failCleanup) {
        throw remoteError(`Unable to delete ${dir}`, dir);
      }
      uploadDirs.delete(dir);
    },
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string, body?: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), { status, statusText });
}
