import { z } from "zod";
import { isValidVersion } from "#/version";
import { DEFAULT_API_URL, DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS } from "#/constants";

// Debian version validation schema
export const DebianVersionSchema = z.string().refine(isValidVersion, {
  message: "Invalid Debian version (e.g., 1.0, 1:2.3-1, 1.0~rc1)",
});

// Signing block as written in the config file. Every field optional,
// unknown keys rejected so typos don't silently disable signing.
export const SigningConfigInputSchema = z
  .object({
    skip: z.boolean().optional(),
    batch: z.boolean().optional(),
    gpgKey: z.string().min(1).optional(),
    keyring: z.string().min(1).optional(),
    secretKeyring: z.string().min(1).optional(),
    passphrase: z.string().optional(),
    passphraseFile: z.string().min(1).optional(),
  })
  .strict();
export type SigningConfigInput = z.infer<typeof SigningConfigInputSchema>;

// One connection profile
export const ProfileSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url().default(DEFAULT_API_URL),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  signing: SigningConfigInputSchema.default({}),
  // Keyed by publish spec "[storage:]prefix/distribution"
  signingOverrides: z.record(z.string(), SigningConfigInputSchema).default({}),
});
export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

// debsync.yaml. Only profile names are checked here; the selected profile
// goes through ProfileSchema after command-line overrides are applied.
export const ConfigFileSchema = z.object({
  profiles: z
    .array(z.object({ name: z.string() }).passthrough())
    .min(1, "At least one profile is required"),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// aptly REST API wire formats
// ---------------------------------------------------------------------------

// aptly sends null for empty lists
const StringListSchema = z
  .array(z.string())
  .nullish()
  .transform((list) => list ?? []);

export const AptlyPublishSourceSchema = z.object({
  Name: z.string(),
  Component: z.string().optional(),
});

export const AptlyPublishSchema = z.object({
  SourceKind: z.enum(["local", "snapshot"]),
  Sources: z
    .array(AptlyPublishSourceSchema)
    .nullish()
    .transform((list) => list ?? []),
  Storage: z.string().default(""),
  Prefix: z.string().default(""),
  Distribution: z.string(),
});
export type AptlyPublish = z.infer<typeof AptlyPublishSchema>;

export const AptlyPublishListSchema = z
  .array(AptlyPublishSchema)
  .nullable()
  .transform((list) => list ?? []);

export const AptlyRepoSchema = z.object({
  Name: z.string(),
  Comment: z.string().default(""),
  DefaultDistribution: z.string().default(""),
  DefaultComponent: z.string().default(""),
});
export type AptlyRepo = z.infer<typeof AptlyRepoSchema>;

export const AptlyRepoListSchema = z
  .array(AptlyRepoSchema)
  .nullable()
  .transform((list) => list ?? []);

// Response to adding uploaded files to a repo
export const AptlyFilesReportSchema = z.object({
  FailedFiles: StringListSchema,
  Report: z
    .object({
      Warnings: StringListSchema,
      Added: StringListSchema,
      Removed: StringListSchema,
    })
    .default({}),
});
export type AptlyFilesReport = z.infer<typeof AptlyFilesReportSchema>;

// Package search returns keys unless details are requested
export const AptlyPackageKeysSchema = StringListSchema;

export const AptlyErrorBodySchema = z.union([
  z.object({ error: z.string() }),
  z.array(z.object({ error: z.string() })).nonempty(),
]);
