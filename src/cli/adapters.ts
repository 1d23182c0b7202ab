import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { text } from "stream/consumers";
import pc from "picocolors";
import type { FileSystem, HttpClient } from "#/core";
import type { CliIO } from "./types";

export const nodeFileSystem: FileSystem = {
  readFile: (path) => readFileSync(path, "utf-8"),
  readFileBinary: (path) => readFileSync(path),
  exists: (path) => existsSync(path),
};

/**
 * Global fetch with a per-request timeout
 */
export const createFetchClient = (timeoutMs: number): HttpClient => ({
  fetch: (url, options = {}) => fetch(url, { ...options, signal: AbortSignal.timeout(timeoutMs) }),
});

export const createNodeIO = (): CliIO => ({
  fs: nodeFileSystem,
  createHttpClient: createFetchClient,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => (process.stdin.isTTY ? Promise.resolve("") : text(process.stdin)),
  home: homedir(),
  colors: pc.isColorSupported,
});
