import {
  RESERVED_FIRST_OCTETS,
  type Direction,
  type FlowRecord,
  type VantagePoint,
} from "../types.js";
import { isHeaderRecord } from "../parser/record.js";
import { addressDigest, hostInPrefix } from "./digest.js";

/**
 * Rehome an internal host under the vantage point's prefix. Depends only on
 * the original address and the prefix, so both directions agree.
 */
export function internalAddress(address: string, vp: VantagePoint): string {
  return hostInPrefix(vp.prefix, addressDigest(address));
}

/**
 * Remap a remote host to a full address keyed by the vantage point name, so
 * each vantage point sees the same remote host under a different address.
 * Uses the first four-byte window of the digest with no reserved octet.
 */
export function externalAddress(address: string, vp: VantagePoint): string {
  const digest = addressDigest(address + vp.name);

  for (let pos = 0; pos + 4 <= digest.length; pos++) {
    const octets = Array.from(digest.subarray(pos, pos + 4));
    if (!octets.some((octet) => RESERVED_FIRST_OCTETS.has(octet))) {
      return octets.join(".");
    }
  }

  throw new Error(
    `Digest of "${address}" for vantage point "${vp.name}" has no usable address window`,
  );
}

/**
 * Inbound flows have the internal host as destination, outbound ones as
 * source. Header records come back untouched.
 */
export function anonymizeRecord(
  record: FlowRecord,
  direction: Direction,
  vp: VantagePoint,
): FlowRecord {
  if (isHeaderRecord(record)) {
    return record;
  }

  if (direction === "inbound") {
    return {
      ...record,
      srcAddr: externalAddress(record.srcAddr, vp),
      dstAddr: internalAddress(record.dstAddr, vp),
    };
  }

  return {
    ...record,
    srcAddr: internalAddress(record.srcAddr, vp),
    dstAddr: externalAddress(record.dstAddr, vp),
  };
}
