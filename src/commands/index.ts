export * from "./commands";
export * from "./commands.types";
