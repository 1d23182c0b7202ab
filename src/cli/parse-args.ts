import cac from "cac";
import { isCommandName, type CommandName } from "#/commands";
import { EngineError } from "#/errors";
import type { CliOptions } from "./types";

export const CLI_NAME = "debsync";

export type ParsedArgs = {
  command: CommandName | null;
  /** Positional arguments after the command name */
  positionals: string[];
  options: CliOptions;
  rawArgs: string[];
  help: boolean;
};

// Flags that take the next argument as their value
const VALUE_FLAGS = new Set([
  "--config",
  "--profile",
  "-C",
  "--config-override",
  "--concurrency",
  "--query",
  "--rotate",
  "--comment",
  "--dist",
  "--comp",
  "--source-kind",
  "--architectures",
  "--label",
  "--origin",
]);

const FLAG_ALIASES: Record<string, string> = { "-C": "--config-override" };

type ScopedKey = Exclude<
  keyof CliOptions,
  "config" | "profile" | "configOverride" | "concurrency" | "json" | "silent" | "verbose"
>;

const SCOPED_OPTIONS: { key: ScopedKey; flag: string; commands: CommandName[] }[] = [
  { key: "forceReplace", flag: "--force-replace", commands: ["put"] },
  { key: "move", flag: "--move", commands: ["copy"] },
  { key: "dryRun", flag: "--dry-run", commands: ["remove", "copy"] },
  { key: "queries", flag: "--query", commands: ["search"] },
  { key: "byName", flag: "--name", commands: ["search"] },
  { key: "dirRefs", flag: "--dir-refs", commands: ["search"] },
  { key: "rotate", flag: "--rotate", commands: ["search"] },
  { key: "detail", flag: "--detail", commands: ["repo", "publish"] },
  { key: "force", flag: "--force", commands: ["repo", "publish"] },
  { key: "comment", flag: "--comment", commands: ["repo"] },
  { key: "distribution", flag: "--dist", commands: ["repo"] },
  { key: "component", flag: "--comp", commands: ["repo"] },
  { key: "sourceKind", flag: "--source-kind", commands: ["publish"] },
  { key: "architectures", flag: "--architectures", commands: ["publish"] },
  { key: "label", flag: "--label", commands: ["publish"] },
  { key: "origin", flag: "--origin", commands: ["publish"] },
];

const invalid = (message: string) => new EngineError("InvalidArgument", message);

const splitFlag = (arg: string): { flag: string; inline?: string } => {
  const equals = arg.indexOf("=");
  return equals === -1 ? { flag: arg } : { flag: arg.slice(0, equals), inline: arg.slice(equals + 1) };
};

/**
 * Split raw arguments into positionals and the text of every value flag.
 * Values are kept as typed; cac would turn "1.10" into 1.1.
 */
const scanArgs = (rawArgs: string[]) => {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  for (let index = 0; index < rawArgs.length; index += 1) {
    const arg = rawArgs[index] ?? "";
    if (arg.length > 1 && arg.startsWith("-")) {
      const { flag, inline } = splitFlag(arg);
      if (VALUE_FLAGS.has(flag)) {
        const name = FLAG_ALIASES[flag] ?? flag;
        let value = inline;
        if (value === undefined) {
          index += 1;
          value = rawArgs[index] ?? "";
        }
        values.set(name, [...(values.get(name) ?? []), value]);
      }
      continue;
    }
    positionals.push(arg);
  }
  return { positionals, values };
};

type FlagValues = Map<string, string[]>;

const listValue = (values: FlagValues, flag: string): string[] => {
  const list = values.get(flag) ?? [];
  if (list.some((value) => value.length === 0)) {
    throw invalid(`${flag} expects a value.`);
  }
  return list;
};

const stringValue = (values: FlagValues, flag: string): string | undefined => {
  const list = listValue(values, flag);
  if (list.length > 1) {
    throw invalid(`${flag} may only be given once.`);
  }
  return list[0];
};

const integerValue = (values: FlagValues, flag: string, min: number): number | undefined => {
  const raw = stringValue(values, flag);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isInteger(parsed) || parsed < min) {
    throw invalid(`${flag} must be a ${min === 0 ? "non-negative" : "positive"} integer.`);
  }
  return parsed;
};

const buildOptions = (flags: Record<string, unknown>, values: FlagValues): CliOptions => {
  const queries = listValue(values, "--query");
  return {
    config: stringValue(values, "--config"),
    profile: stringValue(values, "--profile"),
    configOverride: listValue(values, "--config-override"),
    concurrency: integerValue(values, "--concurrency", 1),
    // Boolean() because cac hands kebab-case booleans the next argument
    json: Boolean(flags.json),
    silent: Boolean(flags.silent),
    verbose: Boolean(flags.verbose),
    forceReplace: Boolean(flags.forceReplace),
    move: Boolean(flags.move),
    dryRun: Boolean(flags.dryRun),
    queries: queries.length > 0 ? queries : undefined,
    byName: Boolean(flags.name),
    dirRefs: Boolean(flags.dirRefs),
    rotate: integerValue(values, "--rotate", 0),
    detail: Boolean(flags.detail),
    force: Boolean(flags.force),
    comment: stringValue(values, "--comment"),
    distribution: stringValue(values, "--dist"),
    component: stringValue(values, "--comp"),
    sourceKind: stringValue(values, "--source-kind"),
    architectures: stringValue(values, "--architectures"),
    label: stringValue(values, "--label"),
    origin: stringValue(values, "--origin"),
  };
};

const assertScopedOptions = (command: CommandName | null, options: CliOptions) => {
  for (const scoped of SCOPED_OPTIONS) {
    const value = options[scoped.key];
    const given = value !== undefined && value !== false;
    if (given && (command === null || !scoped.commands.includes(command))) {
      throw invalid(`${scoped.flag} is only valid for ${scoped.commands.join(" and ")}.`);
    }
  }
};

/**
 * Parse process arguments (including the node and script entries).
 * Throws InvalidArgument on unknown commands and malformed options.
 */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const cli = cac(CLI_NAME);

  cli
    .option("--config <path>", "Path to config file")
    .option("--profile <name>", "Profile name, name prefix or index")
    .option("-C, --config-override <pair>", "Override a profile value (key.path=value)")
    .option("--concurrency <n>", "Parallel remote calls")
    .option("--json", "Output JSON")
    .option("--silent", "Suppress non-error output")
    .option("--verbose", "Enable verbose logging")
    .option("-h, --help", "Display help");

  cli
    .command("put <repo> [...packages]", "Upload package files to a repo")
    .option("--force-replace", "Replace packages that conflict");
  cli.command("remove [...refs]", "Remove packages").option("--dry-run", "Show what would change");
  cli
    .command("copy <from> <to> [...keys]", "Copy packages between repos")
    .option("--move", "Remove from the source repo")
    .option("--dry-run", "Show what would change");
  cli
    .command("search [...repos]", "Search packages")
    .option("--query <q>", "Package query, repeatable")
    .option("--name", "Match package names by regular expression")
    .option("--dir-refs", "Print <repo>/<name>_<version>_<arch>")
    .option("--rotate <n>", "Versions to keep per package");
  cli
    .command("repo <action> [name]", "Manage local repos")
    .option("--detail", "Show repo settings")
    .option("--force", "Delete even when published")
    .option("--comment <text>", "Repo comment")
    .option("--dist <dist>", "Default distribution")
    .option("--comp <comp>", "Default component");
  cli
    .command("publish <action> [spec] [...sources]", "Manage publishes")
    .option("--detail", "Show publish settings")
    .option("--force", "Overwrite files or drop when in use")
    .option("--source-kind <kind>", "local or snapshot")
    .option("--architectures <list>", "Comma-separated architectures")
    .option("--label <label>", "Release label")
    .option("--origin <origin>", "Release origin");

  const result = cli.parse(argv, { run: false });
  const rawArgs = argv.slice(2);
  const { positionals: [name, ...positionals], values } = scanArgs(rawArgs);

  let command: CommandName | null = null;
  if (name !== undefined) {
    if (!isCommandName(name)) {
      throw invalid(`Unknown command '${name}'.`);
    }
    command = name;
  }

  const options = buildOptions(result.options, values);
  assertScopedOptions(command, options);

  return {
    command,
    positionals,
    options,
    rawArgs,
    help: Boolean(result.options.help),
  };
};
