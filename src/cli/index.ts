import { COMMANDS, type CommandResult } from "#/commands";
import { loadProfile, parseOverrides, type ConfigOverride } from "#/config";
import { EngineError, errorMessage } from "#/errors";
import {
  formatFailureLines,
  formatOutcomeSummary,
  formatResultLines,
  hasFailures,
  resultFailures,
  toJsonResult,
} from "#/formatters";
import { AptlyClient } from "#/remote";
import type { SyncContext } from "#/sync";
import { ExitCode } from "./exit-code";
import { CLI_NAME, parseArgs, type ParsedArgs } from "./parse-args";
import type { CliIO } from "./types";
import { createConsoleSink, createUi } from "./ui";

const GLOBAL_OPTIONS = [
  "--config <path>",
  "--profile <name>",
  "-C, --config-override <key.path=value>",
  "--concurrency <n>",
  "--json",
  "--silent",
  "--verbose",
];

export const helpText = (): string => {
  const commands = Object.values(COMMANDS).flatMap((command) => [
    `  ${command.name.padEnd(9)}${command.usage}`,
    `  ${"".padEnd(9)}${command.description}`,
  ]);
  return [
    `Usage: ${CLI_NAME} [options] <command> ...`,
    "",
    "Commands:",
    ...commands,
    "",
    "Global options:",
    ...GLOBAL_OPTIONS.map((option) => `  ${option}`),
    "",
  ].join("\n");
};

const exitCodeFor = (error: unknown): ExitCode =>
  error instanceof EngineError && (error.kind === "InvalidArgument" || error.kind === "InvalidVersion")
    ? ExitCode.InvalidArgument
    : ExitCode.FatalError;

/**
 * Run the CLI against the given IO and resolve to the exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<ExitCode> {
  const ui = createUi(io.colors);
  const printError = (message: string) => {
    io.stderr(`${ui.symbols.error} ${message}\n`);
  };

  let parsed: ParsedArgs;
  let overrides: ConfigOverride[];
  try {
    parsed = parseArgs(argv);
    overrides = parseOverrides(parsed.options.configOverride);
  } catch (error) {
    printError(errorMessage(error));
    return ExitCode.InvalidArgument;
  }

  if (parsed.help) {
    io.stdout(helpText());
    return ExitCode.Success;
  }

  if (!parsed.command) {
    io.stderr(helpText());
    return ExitCode.InvalidArgument;
  }

  const { options } = parsed;
  const loaded = loadProfile(io.fs, {
    configPath: options.config,
    profile: options.profile,
    overrides,
    home: io.home,
  });
  if (!loaded.success) {
    for (const line of ui.friendlyError(loaded.error)) {
      io.stderr(`${line}\n`);
    }
    return ExitCode.FatalError;
  }

  const { profile, configPath } = loaded.data;
  const events = createConsoleSink(ui, {
    silent: options.silent,
    verbose: options.verbose,
    write: io.stderr,
  });
  events.emit({
    level: "debug",
    type: "profile",
    message: `Profile ${profile.name} (${configPath ?? "defaults"}) at ${profile.url}`,
    data: { profile: profile.name, url: profile.url },
  });

  const ctx: SyncContext = {
    remote: new AptlyClient(profile.url, io.createHttpClient(profile.timeoutMs)),
    events,
    fs: io.fs,
    signing: profile,
    concurrency: options.concurrency ?? profile.concurrency,
    now: io.now,
  };

  let result: CommandResult;
  try {
    result = await COMMANDS[parsed.command].run(ctx, {
      positionals: parsed.positionals,
      readInput: io.readStdin,
      forceReplace: options.forceReplace,
      move: options.move,
      dryRun: options.dryRun,
      queries: options.queries,
      byName: options.byName,
      dirRefs: options.dirRefs,
      rotate: options.rotate,
      detail: options.detail,
      force: options.force,
      comment: options.comment,
      distribution: options.distribution,
      component: options.component,
      sourceKind: options.sourceKind,
      architectures: options.architectures,
      label: options.label,
      origin: options.origin,
    });
  } catch (error) {
    printError(errorMessage(error));
    return exitCodeFor(error);
  }

  const failed = hasFailures(result);
  if (options.json) {
    io.stdout(`${JSON.stringify(toJsonResult(result), null, 2)}\n`);
  } else {
    for (const line of formatResultLines(result)) {
      io.stdout(`${line}\n`);
    }
    for (const line of formatFailureLines(resultFailures(result))) {
      io.stderr(`${line}\n`);
    }
    if (result.kind === "sync" && !options.silent) {
      io.stderr(`${ui.summary(formatOutcomeSummary(result.outcome), failed)}\n`);
    }
  }

  return failed ? ExitCode.FatalError : ExitCode.Success;
}

export { ExitCode } from "./exit-code";
export { parseArgs, CLI_NAME } from "./parse-args";
export type { ParsedArgs } from "./parse-args";
export type { CliIO, CliOptions } from "./types";
export { createConsoleSink, createUi, shouldShow } from "./ui";
export { createNodeIO, createFetchClient, nodeFileSystem } from "./adapters";
