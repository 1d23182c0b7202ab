/**
 * Errors module
 *
 * Error kinds, the EngineError class and Result helpers.
 */

export * from "./errors";
