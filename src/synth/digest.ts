import { createHash } from "node:crypto";

/**
 * Reproducible pseudo-random bytes for a string. MD5 is used purely for its
 * spread; nothing here relies on collision resistance.
 */
export function addressDigest(input: string): Buffer {
  return createHash("md5").update(input, "utf8").digest();
}

/** `<prefix>.<d0>.<d1>` */
export function hostInPrefix(prefix: string, digest: Uint8Array): string {
  return `${prefix}.${digest[0]}.${digest[1]}`;
}
