import { createHash } from "crypto";
import { basename } from "path";
import type { PackageFileInfo } from "./packageRef.types";

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

function fnv1a64(data: Uint8Array): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of data) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

/**
 * Checksums of a package file's content
 */
export function describePackageFile(path: string, content: Buffer): PackageFileInfo {
  return {
    filename: basename(path),
    size: content.length,
    md5: createHash("md5").update(content).digest("hex"),
    sha1: createHash("sha1").update(content).digest("hex"),
    sha256: createHash("sha256").update(content).digest("hex"),
  };
}

/**
 * The hash aptly puts at the end of a package key: FNV-1a 64 over the
 * filename, the size as 8 big-endian bytes and the three hex digests.
 */
export function computeFilesHash(file: PackageFileInfo): string {
  const size = Buffer.alloc(8);
  size.writeBigUInt64BE(BigInt(file.size));

  const data = Buffer.concat([
    Buffer.from(file.filename, "ascii"),
    size,
    Buffer.from(file.md5, "ascii"),
    Buffer.from(file.sha1, "ascii"),
    Buffer.from(file.sha256, "ascii"),
  ]);

  return fnv1a64(data).toString(16);
}
