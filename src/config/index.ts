export * from "./profiles";
export * from "./overrides";
export type * from "./config.types";
