export type Direction = "inbound" | "outbound";

export const DIRECTIONS: readonly Direction[] = ["inbound", "outbound"];

/**
 * One flow summary as written by the flow-dump tool. Columns stay textual so
 * that a record read from the noise log serializes back byte-for-byte.
 */
export interface FlowRecord {
  readonly srcAddr: string;
  readonly dstAddr: string;
  readonly srcPort: string;
  readonly dstPort: string;
  readonly protocol: string;
  readonly packets: string;
  readonly bytes: string;
  readonly flags: string;
  readonly startTime: string;
  readonly duration: string;
  readonly endTime: string;
  readonly sensor: string;
  /** Epoch milliseconds of `startTime`, or null on header lines. */
  readonly startedAt: number | null;
}

export type FlowField = Exclude<keyof FlowRecord, "startedAt">;

export const FLOW_FIELDS: readonly FlowField[] = [
  "srcAddr",
  "dstAddr",
  "srcPort",
  "dstPort",
  "protocol",
  "packets",
  "bytes",
  "flags",
  "startTime",
  "duration",
  "endTime",
  "sensor",
];

export const FIELD_WIDTHS: Readonly<Record<FlowField, number>> = {
  srcAddr: 39,
  dstAddr: 39,
  srcPort: 5,
  dstPort: 5,
  protocol: 3,
  packets: 10,
  bytes: 10,
  flags: 0,
  startTime: 23,
  duration: 9,
  endTime: 23,
  sensor: 3,
};

export interface FlowFieldDef {
  name: FlowField;
  column: string;
  description: string;
}

export const FLOW_FIELD_DEFINITIONS: readonly FlowFieldDef[] = [
  { name: "srcAddr", column: "sIP", description: "Source IP address" },
  { name: "dstAddr", column: "dIP", description: "Destination IP address" },
  { name: "srcPort", column: "sPort", description: "Source port" },
  { name: "dstPort", column: "dPort", description: "Destination port" },
  { name: "protocol", column: "pro", description: "IP protocol number (6 = TCP, 17 = UDP)" },
  { name: "packets", column: "packets", description: "Packet count" },
  { name: "bytes", column: "bytes", description: "Byte count" },
  { name: "flags", column: "flags", description: "TCP flags, fixed 8-character layout, whitespace-significant" },
  { name: "startTime", column: "sTime", description: "Start time, YYYY/MM/DDTHH:MM:SS.mmm" },
  { name: "duration", column: "duration", description: "Duration in seconds, 3 decimals" },
  { name: "endTime", column: "eTime", description: "End time, YYYY/MM/DDTHH:MM:SS.mmm" },
  { name: "sensor", column: "sen", description: "Sensor identifier" },
];

/** Header lines carry the column names where values would be. */
export const HEADER_SOURCE_MARKER = "sIP";
export const HEADER_START_TIME_MARKER = "sTime";

/** First octets never handed out to synthetic addresses. */
export const RESERVED_FIRST_OCTETS: ReadonlySet<number> = new Set([0, 10, 127, 172, 255]);

export const PROTO_TCP = "6";
export const PROTO_UDP = "17";

export const NO_FLAGS = "        ";
export const SYN_ONLY_FLAGS = " S      ";

export interface VantagePoint {
  /** First two octets, e.g. "172.16". */
  readonly prefix: string;
  readonly name: string;
  readonly hasAmplifiers: boolean;
  readonly hasBots: boolean;
  readonly victimAddress: string | null;
}

export interface ProbeSettings {
  readonly enabled: boolean;
  readonly perTimestep: number;
  /** Whole seconds. */
  readonly duration: number;
  readonly dstPort: number;
}

export interface ReflectionSettings {
  readonly servicePort: number;
  readonly clientPort: number;
  readonly inputPacketsPerFlow: number;
  readonly inputBytesPerFlow: number;
  readonly outputPacketsPerFlow: number;
  readonly outputBytesPerFlow: number;
}

export interface BotSettings {
  readonly dstPort: number;
  readonly outputPacketsPerFlow: number;
  readonly outputBytesPerFlow: number;
}

export interface AttackTopology {
  readonly vantagePoints: readonly VantagePoint[];
  readonly amplifiersPerNode: number;
  readonly botsPerNode: number;
  /** Noise lines between synthesis triggers; 0 is the densest setting. */
  readonly syntheticInterval: number;
  /** Seconds, for amplifier and bot flows. */
  readonly flowDuration: number;
  readonly probes: ProbeSettings;
  readonly reflection: ReflectionSettings;
  readonly bots: BotSettings;
}

export type AttackKind = "amplifier" | "bot" | "victim" | "probe";

export const ATTACK_KINDS: readonly AttackKind[] = ["amplifier", "bot", "victim", "probe"];
