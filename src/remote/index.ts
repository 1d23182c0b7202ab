export * from "./remote.types";
export { AptlyClient } from "./aptly-client";
