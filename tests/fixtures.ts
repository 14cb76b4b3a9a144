import * as path from "node:path";
import type { AttackTopology, VantagePoint } from "../src/types.js";
import type { RandomSource } from "../src/synth/random.js";

export const TEST_DATA_DIR = path.join(process.cwd(), "test-data");
export const NOISE_DIR = path.join(TEST_DATA_DIR, "noise");
export const SMALL_TOPOLOGY_PATH = path.join(TEST_DATA_DIR, "topologies", "small.json");

export const HEADER_LINE =
  "                                    sIP|                                    dIP|sPort|dPort|pro|   packets|     bytes|   flags|                  sTime| duration|                  eTime|sen|";

export const SAMPLE_LINE =
  "10.1.1.5|93.184.216.34|1234|80|6|3|180| S      |2024/01/01T00:00:00.000|0.010|2024/01/01T00:00:00.010|S0|";

export const vpA: VantagePoint = {
  prefix: "172.16",
  name: "A",
  hasAmplifiers: true,
  hasBots: true,
  victimAddress: null,
};

export const vpB: VantagePoint = {
  prefix: "172.17",
  name: "B",
  hasAmplifiers: false,
  hasBots: true,
  victimAddress: null,
};

export const vpV: VantagePoint = {
  prefix: "172.21",
  name: "V",
  hasAmplifiers: false,
  hasBots: false,
  victimAddress: "172.21.99.99",
};

/** Same shape as test-data/topologies/small.json, but triggering on every other line and without probes. */
export const TEST_TOPOLOGY: AttackTopology = {
  vantagePoints: [vpA, vpB, vpV],
  amplifiersPerNode: 1,
  botsPerNode: 2,
  syntheticInterval: 0,
  flowDuration: 55,
  probes: { enabled: false, perTimestep: 2, duration: 5, dstPort: 2323 },
  reflection: {
    servicePort: 123,
    clientPort: 80,
    inputPacketsPerFlow: 1,
    inputBytesPerFlow: 200,
    outputPacketsPerFlow: 300,
    outputBytesPerFlow: 200000,
  },
  bots: { dstPort: 53, outputPacketsPerFlow: 20, outputBytesPerFlow: 6000 },
};

export function withTopology(overrides: Partial<AttackTopology>): AttackTopology {
  return { ...TEST_TOPOLOGY, ...overrides };
}

/** Always the lower bound: jitter adds nothing, unprefixed addresses are 1.1.1.1. */
export const minRandom: RandomSource = { int: (min) => min };

/** Always the upper bound. */
export const maxRandom: RandomSource = { int: (_min, max) => max };

/** Hands out `values` in order, ignoring the requested range. */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let next = 0;
  return {
    int() {
      if (next >= values.length) {
        throw new Error("scripted random source exhausted");
      }
      return values[next++];
    },
  };
}
