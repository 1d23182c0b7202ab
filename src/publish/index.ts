export * from "./publishTarget";
export * from "./dependents";
export type * from "./publish.types";
