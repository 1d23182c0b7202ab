/**
 * debsync
 *
 * Deterministic core for keeping aptly repos and their publishes in sync.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from "#/core";

// Error kinds and Result helpers
export * from "#/errors";

// Schemas (Zod validation)
export * from "#/schemas";

// Config files and profiles
export * from "#/config";
export * from "#/friendly-errors";

// Debian versions
export * from "#/version";

// Package references and file hashes
export * from "#/packageRef";

// Publishes and their dependency on repos
export * from "#/publish";

// Signing resolution
export * from "#/signing";

// Rotation
export * from "#/rotation";

// Remote service (aptly API client)
export * from "#/remote";

// put / remove / copy / search workflows
export * from "#/sync";

// Repo and publish administration
export * from "#/manage";

// Command registry
export * from "#/commands";

// Formatters (pure utilities)
export * from "#/formatters";
