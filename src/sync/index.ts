/**
 * Sync module
 *
 * put / remove / copy workflows against a remote service, plus search with
 * rotation. Everything goes through the injected SyncContext.
 */

export * from "./sync.types";
export { runPut, runRemove, runCopy, runSearchWithRotation, nameQuery, uploadDirName } from "./orchestrator";
export { describeItem } from "./outcome";
export { runPool } from "./pool";
