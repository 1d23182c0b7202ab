/**
 * Command registry
 *
 * Static record of the CLI's commands. Each command turns positional
 * arguments into workflow input and runs it against the given context.
 */

import { EngineError } from "#/errors";
import {
  createPublish,
  createRepo,
  deleteRepo,
  dropPublish,
  editRepo,
  isPublishSourceKind,
  listPublishes,
  listRepos,
  updatePublish,
} from "#/manage";
import { parsePackageRef } from "#/packageRef";
import { runCopy, runPut, runRemove, runSearchWithRotation } from "#/sync";
import {
  COMMAND_NAMES,
  type Command,
  type CommandArgs,
  type CommandName,
  type CommandResult,
} from "./commands.types";

function usageError(command: Command): EngineError {
  return new EngineError("InvalidArgument", `Usage: debsync ${command.name} ${command.usage}`);
}

function requirePositionals(command: Command, args: CommandArgs, min: number): string[] {
  if (args.positionals.length < min) {
    throw usageError(command);
  }
  return args.positionals;
}

/**
 * Entries of piped input, one per line. Quotes around an entry are dropped
 * so quoted report lines can be fed back in.
 *
 * @example parseInputLines('"main/Pamd64 nginx 1.0 ab"\n\n') → ["main/Pamd64 nginx 1.0 ab"]
 */
export function parseInputLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/^["']+|["']+$/g, ""))
    .filter((line) => line.length > 0);
}

async function entriesOrInput(command: Command, args: CommandArgs, given: string[]): Promise<string[]> {
  const entries = given.length > 0 || !args.readInput ? given : parseInputLines(await args.readInput());
  if (entries.length === 0) {
    throw usageError(command);
  }
  return entries;
}

export const putCommand: Command = {
  name: "put",
  description: "Upload package files to a repo and update its publishes",
  usage: "<repo> [package...] [--force-replace]",
  async run(deps, args) {
    const [repo = "", ...given] = requirePositionals(putCommand, args, 1);
    const artifacts = await entriesOrInput(putCommand, args, given);
    const outcome = await runPut(deps, { repo, artifacts, forceReplace: args.forceReplace });
    return { kind: "sync", outcome };
  },
};

export const removeCommand: Command = {
  name: "remove",
  description: "Remove packages from their repos and update affected publishes",
  usage: "[repo/key...] [--dry-run]",
  async run(deps, args) {
    const references = await entriesOrInput(removeCommand, args, args.positionals);
    const refs = references.map((reference) => parsePackageRef(reference));
    const outcome = await runRemove(deps, { refs, dryRun: args.dryRun });
    return { kind: "sync", outcome };
  },
};

export const copyCommand: Command = {
  name: "copy",
  description: "Copy or move packages between repos and update the destination's publishes",
  usage: "<from> <to> [key...] [--move] [--dry-run]",
  async run(deps, args) {
    const [from = "", to = "", ...given] = requirePositionals(copyCommand, args, 2);
    const keys = await entriesOrInput(copyCommand, args, given);
    const refs = keys.map((key) => {
      const ref = parsePackageRef(key, from);
      if (ref.repo !== from) {
        throw new EngineError("InvalidArgument", `Package reference '${key}' is not in repo ${from}`, {
          item: key,
        });
      }
      return ref;
    });
    const outcome = await runCopy(deps, { from, to, refs, move: args.move, dryRun: args.dryRun });
    return { kind: "sync", outcome };
  },
};

export const searchCommand: Command = {
  name: "search",
  description: "Search packages in repos (all local repos by default), optionally listing rotation surplus",
  usage: "[repo...] [--query <q>...] [--name] [--rotate <n>] [--dir-refs]",
  async run(deps, args) {
    const outcome = await runSearchWithRotation(deps, {
      repos: args.positionals,
      queries: args.queries,
      byName: args.byName,
      keep: args.rotate,
    });
    return { kind: "search", outcome, rotated: args.rotate !== undefined, dirRefs: args.dirRefs ?? false };
  },
};

export const repoCommand: Command = {
  name: "repo",
  description: "List, create, edit or delete local repos",
  usage:
    "list [--detail] | create <name> [--comment <text>] [--dist <dist>] [--comp <comp>] | edit <name> [...] | delete <name> [--force]",
  async run(deps, args): Promise<CommandResult> {
    const [action, name = ""] = requirePositionals(repoCommand, args, 1);
    const settings = {
      comment: args.comment,
      defaultDistribution: args.distribution,
      defaultComponent: args.component,
    };
    switch (action) {
      case "list":
        return { kind: "repos", repos: await listRepos(deps), detail: args.detail ?? false };
      case "create":
        requirePositionals(repoCommand, args, 2);
        return { kind: "repo", action: "created", repo: await createRepo(deps, { name, settings }) };
      case "edit":
        requirePositionals(repoCommand, args, 2);
        return { kind: "repo", action: "edited", repo: await editRepo(deps, { name, settings }) };
      case "delete":
        requirePositionals(repoCommand, args, 2);
        await deleteRepo(deps, { name, force: args.force });
        return { kind: "repo", action: "deleted", name };
      default:
        throw usageError(repoCommand);
    }
  },
};

export const publishCommand: Command = {
  name: "publish",
  description: "List, create, update or drop publishes",
  usage:
    "list [--detail] | create <spec> <source[=component]...> --source-kind <local|snapshot> [--architectures <a,b>] [--label <l>] [--origin <o>] [--force] | update <spec> [--force] | drop <spec> [--force]",
  async run(deps, args): Promise<CommandResult> {
    const [action, spec = "", ...sources] = requirePositionals(publishCommand, args, 1);
    switch (action) {
      case "list":
        return { kind: "publishes", publishes: await listPublishes(deps), detail: args.detail ?? false };
      case "create": {
        requirePositionals(publishCommand, args, 3);
        const sourceKind = args.sourceKind ?? "";
        if (!isPublishSourceKind(sourceKind)) {
          throw new EngineError("InvalidArgument", "--source-kind must be local or snapshot");
        }
        const publish = await createPublish(deps, {
          spec,
          sourceKind,
          sources,
          architectures: args.architectures?.split(",").filter((arch) => arch.length > 0),
          label: args.label,
          origin: args.origin,
          forceOverwrite: args.force,
        });
        return { kind: "publish", action: "created", publish };
      }
      case "update":
        requirePositionals(publishCommand, args, 2);
        return {
          kind: "publish",
          action: "updated",
          publish: await updatePublish(deps, { spec, forceOverwrite: args.force }),
        };
      case "drop":
        requirePositionals(publishCommand, args, 2);
        return {
          kind: "publish",
          action: "dropped",
          publish: await dropPublish(deps, { spec, force: args.force }),
        };
      default:
        throw usageError(publishCommand);
    }
  },
};

export const COMMANDS: Record<CommandName, Command> = {
  put: putCommand,
  remove: removeCommand,
  copy: copyCommand,
  search: searchCommand,
  repo: repoCommand,
  publish: publishCommand,
};

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

export function getCommand(name: string): Command | undefined {
  return isCommandName(name) ? COMMANDS[name] : undefined;
}
