import type { FileSystem, HttpClient } from "#/core";

export interface CliOptions {
  config?: string;
  profile?: string;
  /** Raw "key.path=value" pairs from -C */
  configOverride: string[];
  concurrency?: number;
  json: boolean;
  silent: boolean;
  verbose: boolean;
  forceReplace: boolean;
  move: boolean;
  dryRun: boolean;
  queries?: string[];
  byName: boolean;
  dirRefs: boolean;
  rotate?: number;
  detail: boolean;
  force: boolean;
  comment?: string;
  distribution?: string;
  component?: string;
  sourceKind?: string;
  architectures?: string;
  label?: string;
  origin?: string;
}

/**
 * Everything the CLI touches outside the engine
 */
export interface CliIO {
  fs: FileSystem;
  createHttpClient(timeoutMs: number): HttpClient;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Piped input, empty when stdin is a terminal */
  readStdin(): Promise<string>;
  home: string;
  colors: boolean;
  now?: () => number;
}
