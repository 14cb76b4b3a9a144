import * as fs from "node:fs";
import * as path from "node:path";
import {
  DIRECTIONS,
  PROTO_TCP,
  SYN_ONLY_FLAGS,
  type AttackTopology,
  type Direction,
  type FlowRecord,
} from "../types.js";
import { ResourceError } from "../errors.js";
import { readFlowFile } from "../parser/index.js";
import { outputFileName } from "../pipeline/sinks.js";
import { listAttackers } from "../synth/attackers.js";
import { groupBy, sumField, countUnique, topN, type AggregationResult } from "./aggregation.js";
import { normalizedEntropy, shannonEntropy } from "./entropy.js";

export interface LabelCounts {
  /** Flows to or from a synthetic amplifier address. */
  amplifier: number;
  /** Flows from a synthetic bot address. */
  bot: number;
  /** Flows to or from the victim address. */
  victim: number;
  /** SYN-only TCP flows to the configured probe port. */
  probe: number;
}

export interface FileSummary {
  file: string;
  vantagePoint: string;
  direction: Direction;
  flows: number;
  packets: number;
  bytes: number;
  uniqueSources: number;
  uniqueDestinations: number;
  srcAddrEntropy: number;
  srcAddrEntropyNormalized: number;
  protocols: AggregationResult;
  topSources: Array<{ value: string; count: number }>;
  topDestinations: Array<{ value: string; count: number }>;
  labeled: LabelCounts;
}

/** Per-file statistics and ground-truth label counts of a generated dataset. */
export async function summarizeOutput(
  outputDir: string,
  topology: AttackTopology,
  limit = 10,
): Promise<FileSummary[]> {
  const inventory = listAttackers(topology);
  const amplifiers = new Set(inventory.vantagePoints.flatMap((vp) => vp.amplifiers));
  const bots = new Set(inventory.vantagePoints.flatMap((vp) => vp.bots));
  const victim = inventory.victim?.address ?? null;

  const summaries: FileSummary[] = [];
  for (const vp of topology.vantagePoints) {
    for (const direction of DIRECTIONS) {
      const file = path.join(outputDir, outputFileName(vp.name, direction));
      if (!fs.existsSync(file)) {
        throw new ResourceError(`Missing output file ${file}`);
      }

      const records = await readFlowFile(file);
      summaries.push({
        file,
        vantagePoint: vp.name,
        direction,
        flows: records.length,
        packets: sumField(records, "packets"),
        bytes: sumField(records, "bytes"),
        uniqueSources: countUnique(records, "srcAddr"),
        uniqueDestinations: countUnique(records, "dstAddr"),
        srcAddrEntropy: round(shannonEntropy(records.map((r) => r.srcAddr))),
        srcAddrEntropyNormalized: round(normalizedEntropy(records.map((r) => r.srcAddr))),
        protocols: groupBy(records, "protocol", limit),
        topSources: topN(records, "srcAddr", limit),
        topDestinations: topN(records, "dstAddr", limit),
        labeled: countLabels(records, amplifiers, bots, victim, topology.probes.dstPort),
      });
    }
  }
  return summaries;
}

export function countLabels(
  records: readonly FlowRecord[],
  amplifiers: ReadonlySet<string>,
  bots: ReadonlySet<string>,
  victim: string | null,
  probePort: number,
): LabelCounts {
  const counts: LabelCounts = { amplifier: 0, bot: 0, victim: 0, probe: 0 };
  const probeDstPort = String(probePort);

  for (const record of records) {
    if (amplifiers.has(record.srcAddr) || amplifiers.has(record.dstAddr)) counts.amplifier++;
    if (bots.has(record.srcAddr)) counts.bot++;
    if (victim !== null && (record.srcAddr === victim || record.dstAddr === victim)) {
      counts.victim++;
    }
    if (
      record.protocol === PROTO_TCP &&
      record.flags === SYN_ONLY_FLAGS &&
      record.dstPort === probeDstPort
    ) {
      counts.probe++;
    }
  }
  return counts;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
