import { RESERVED_FIRST_OCTETS } from "../types.js";

/**
 * Non-reproducible randomness for values that need not agree across views:
 * counter jitter, probe addresses and ephemeral ports.
 */
export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
}

export const mathRandom: RandomSource = {
  int(min, max) {
    return Math.floor(Math.random() * (max - min + 1)) + min;
  },
};

/** floor + U[0, floor] */
export function jitter(random: RandomSource, floor: number): number {
  return floor + random.int(0, floor);
}

/**
 * Random address with non-zero octets. With a two-octet prefix only the host
 * half is drawn; without one the first octet skips the reserved set.
 */
export function randomAddress(random: RandomSource, prefix?: string): string {
  let network = prefix;
  if (network === undefined) {
    let first: number;
    do {
      first = random.int(1, 255);
    } while (RESERVED_FIRST_OCTETS.has(first));
    network = `${first}.${random.int(1, 255)}`;
  }
  return `${network}.${random.int(1, 255)}.${random.int(1, 255)}`;
}
