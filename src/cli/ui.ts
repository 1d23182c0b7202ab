import pc from "picocolors";
import type { EngineEvent, EventSink } from "#/core";
import type { FriendlyError } from "#/friendly-errors";

// Reported in the command's own output
const REPORTED_EVENTS = new Set(["item-succeeded", "item-failed"]);

export const createUi = (colorize: boolean = pc.isColorSupported) => {
  const colors = pc.createColors(colorize);
  const symbols = {
    error: colors.red("✖"),
    success: colors.green("✔"),
    info: colors.blue("ℹ"),
    warn: colors.yellow("⚠"),
    debug: colors.dim("·"),
  };

  return {
    colors,
    symbols,

    event: (event: EngineEvent) => {
      const message = event.level === "debug" ? colors.dim(event.message) : event.message;
      return `${symbols[event.level]} ${message}`;
    },

    friendlyError: (error: FriendlyError) => [
      `${symbols.error} ${error.message}`,
      ...(error.details ?? []).map((detail) => `  ${colors.gray(detail)}`),
    ],

    summary: (text: string, failed: boolean) =>
      `${failed ? symbols.error : symbols.success} ${colors.bold(text)}`,
  };
};

export type Ui = ReturnType<typeof createUi>;

export type ConsoleSinkOptions = {
  silent: boolean;
  verbose: boolean;
  write: (text: string) => void;
};

/**
 * Whether the console shows an event: errors always, item results and
 * debug only with --verbose, nothing else with --silent
 */
export const shouldShow = (event: EngineEvent, options: Pick<ConsoleSinkOptions, "silent" | "verbose">) => {
  if (REPORTED_EVENTS.has(event.type)) {
    return options.verbose;
  }
  if (event.level === "error") {
    return true;
  }
  if (options.silent) {
    return false;
  }
  return event.level !== "debug" || options.verbose;
};

export const createConsoleSink = (ui: Ui, options: ConsoleSinkOptions): EventSink => ({
  emit(event) {
    if (shouldShow(event, options)) {
      options.write(`${ui.event(event)}\n`);
    }
  },
});
