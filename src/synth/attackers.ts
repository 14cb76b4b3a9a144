import type { AttackTopology, VantagePoint } from "../types.js";
import { addressDigest, hostInPrefix } from "./digest.js";

export function amplifierDigest(vp: VantagePoint, index: number): Buffer {
  return addressDigest(vp.prefix + String(index));
}

export function amplifierAddress(vp: VantagePoint, index: number): string {
  return hostInPrefix(vp.prefix, amplifierDigest(vp, index));
}

export function botDigest(vp: VantagePoint, index: number): Buffer {
  return addressDigest(`${vp.prefix}${index}bot`);
}

export function botAddress(vp: VantagePoint, index: number): string {
  return hostInPrefix(vp.prefix, botDigest(vp, index));
}

export interface AttackerInventory {
  victim: { vantagePoint: string; address: string } | null;
  vantagePoints: Array<{
    name: string;
    prefix: string;
    amplifiers: string[];
    bots: string[];
  }>;
}

/** Every synthetic attacker address the topology will emit, per vantage point. */
export function listAttackers(topology: AttackTopology): AttackerInventory {
  const victim = topology.vantagePoints.find((vp) => vp.victimAddress !== null);
  const victimAddress = victim?.victimAddress ?? null;

  return {
    victim:
      victim && victimAddress !== null
        ? { vantagePoint: victim.name, address: victimAddress }
        : null,
    vantagePoints: topology.vantagePoints.map((vp) => ({
      name: vp.name,
      prefix: vp.prefix,
      amplifiers: vp.hasAmplifiers
        ? range(topology.amplifiersPerNode).map((i) => amplifierAddress(vp, i))
        : [],
      bots: vp.hasBots ? range(topology.botsPerNode).map((i) => botAddress(vp, i)) : [],
    })),
  };
}

export function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}
