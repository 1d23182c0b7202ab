export * from "./packageRef";
export * from "./filesHash";
export type * from "./packageRef.types";
