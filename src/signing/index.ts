export * from "./signing";
export type * from "./signing.types";
