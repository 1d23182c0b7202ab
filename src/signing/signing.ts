/**
 * Signing configuration resolution
 *
 * A publish is signed with the profile's default signing block, with the
 * override for its exact publish key merged on top field by field.
 * Keys are never matched by prefix or wildcard.
 */

import { EngineError } from "#/errors";
import { publishKey, type PublishLocation } from "#/publish";
import type { SigningConfigInput } from "#/schemas";
import type {
  SigningConfig,
  SigningKeyParams,
  SigningParams,
  SigningProfile,
} from "./signing.types";

const SIGNING_FIELDS = [
  "skip",
  "batch",
  "gpgKey",
  "keyring",
  "secretKeyring",
  "passphrase",
  "passphraseFile",
] as const satisfies readonly (keyof SigningConfigInput)[];

/**
 * Merge `override` over `base`. Fields the override leaves unset inherit
 * the base value.
 */
export function mergeSigningConfig(
  base: SigningConfigInput,
  override: SigningConfigInput | undefined
): SigningConfigInput {
  if (!override) {
    return { ...base };
  }
  const merged: SigningConfigInput = { ...base };
  for (const field of SIGNING_FIELDS) {
    const value = override[field];
    if (value !== undefined) {
      Object.assign(merged, { [field]: value });
    }
  }
  return merged;
}

/**
 * Fill unset flags with system defaults: batch mode on, and signing skipped
 * unless a key is configured.
 */
export function applySigningDefaults(input: SigningConfigInput): SigningConfig {
  const config: SigningConfig = {
    skip: input.skip ?? !input.gpgKey,
    batch: input.batch ?? true,
  };
  if (input.gpgKey !== undefined) config.gpgKey = input.gpgKey;
  if (input.keyring !== undefined) config.keyring = input.keyring;
  if (input.secretKeyring !== undefined) config.secretKeyring = input.secretKeyring;
  if (input.passphrase !== undefined) config.passphrase = input.passphrase;
  if (input.passphraseFile !== undefined) config.passphraseFile = input.passphraseFile;
  return config;
}

/**
 * Throws MissingSigningKey when signing is requested without a key.
 */
export function assertSigningConfig(config: SigningConfig, item: string): void {
  if (config.skip) {
    return;
  }
  if (!config.gpgKey) {
    throw new EngineError(
      "MissingSigningKey",
      `Signing is enabled for ${item} but no gpgKey is configured`,
      { item }
    );
  }
  if (config.passphrase !== undefined && config.passphraseFile !== undefined) {
    throw new EngineError(
      "InvalidArgument",
      `Signing for ${item} sets both passphrase and passphraseFile`,
      { item }
    );
  }
}

/**
 * Signing configuration for one publish.
 *
 * @example
 * resolveSigningConfig(
 *   { signing: { gpgKey: "a" }, signingOverrides: { "./buster": { gpgKey: "b" } } },
 *   { prefix: ".", distribution: "buster" }
 * ) → { skip: false, batch: true, gpgKey: "b" }
 */
export function resolveSigningConfig(
  profile: SigningProfile,
  target: PublishLocation
): SigningConfig {
  const key = publishKey(target);
  const override = Object.hasOwn(profile.signingOverrides, key)
    ? profile.signingOverrides[key]
    : undefined;

  const config = applySigningDefaults(mergeSigningConfig(profile.signing, override));
  assertSigningConfig(config, key);
  return config;
}

/**
 * Check the default block and every override up front, so a broken
 * signing setup fails before anything is changed remotely.
 */
export function validateSigningProfile(profile: SigningProfile): void {
  assertSigningConfig(applySigningDefaults(profile.signing), "default signing");
  for (const [key, override] of Object.entries(profile.signingOverrides)) {
    assertSigningConfig(applySigningDefaults(mergeSigningConfig(profile.signing, override)), key);
  }
}

export function toSigningParams(config: SigningConfig): SigningParams {
  if (config.skip) {
    return { Skip: true };
  }
  const params: SigningKeyParams = { Batch: config.batch };
  if (config.gpgKey) params.GpgKey = config.gpgKey;
  if (config.keyring) params.Keyring = config.keyring;
  if (config.secretKeyring) params.SecretKeyring = config.secretKeyring;
  if (config.passphrase) params.Passphrase = config.passphrase;
  if (config.passphraseFile) params.PassphraseFile = config.passphraseFile;
  return params;
}
