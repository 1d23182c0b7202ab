import type { SigningConfigInput } from "#/schemas";

/**
 * Fully resolved signing configuration for one publish refresh
 */
export interface SigningConfig {
  skip: boolean;
  batch: boolean;
  gpgKey?: string;
  keyring?: string;
  secretKeyring?: string;
  passphrase?: string;
  passphraseFile?: string;
}

/**
 * The part of a profile signing resolution reads
 */
export interface SigningProfile {
  signing: SigningConfigInput;
  /** Keyed by normalized publish key "[storage:]prefix/distribution" */
  signingOverrides: Record<string, SigningConfigInput>;
}

/**
 * `Signing` object of an aptly publish request
 */
export type SigningParams = { Skip: true } | SigningKeyParams;

export interface SigningKeyParams {
  Batch: boolean;
  GpgKey?: string;
  Keyring?: string;
  SecretKeyring?: string;
  Passphrase?: string;
  PassphraseFile?: string;
}
