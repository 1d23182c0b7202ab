export * from "./manage";
export type * from "./manage.types";
