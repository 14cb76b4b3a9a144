import {
  NO_FLAGS,
  PROTO_TCP,
  PROTO_UDP,
  SYN_ONLY_FLAGS,
  type AttackKind,
  type AttackTopology,
  type Direction,
  type FlowRecord,
  type VantagePoint,
} from "../types.js";
import { ConfigurationError } from "../errors.js";
import { durationMillis, formatDuration, formatTimestamp } from "../parser/record.js";
import { validateTopology } from "../topology/index.js";
import {
  amplifierAddress,
  botAddress,
  botDigest,
  range,
} from "./attackers.js";
import { jitter, mathRandom, randomAddress, type RandomSource } from "./random.js";

export interface SinkKey {
  vantagePoint: string;
  direction: Direction;
}

export interface SyntheticFlow {
  kind: AttackKind;
  sink: SinkKey;
  record: FlowRecord;
}

export const BOT_PORT_BASE = 10000;
export const BOT_PORT_SPAN = 55536;

const AMPLIFIER_STEP_MS = 10;
const BOT_STEP_MS = 10;
const PROBE_STEP_MS = 15;
const PROBE_BYTES_PER_PACKET = 64;
const EPHEMERAL_PORT_MIN = 49152;
const EPHEMERAL_PORT_MAX = 65535;

/**
 * Source-port state for bot floods, owned by one direction pass.
 *
 * The port mixes the bot's digest with the number of bot flows emitted so
 * far in the pass. A vantage point's own floods are numbered in the outbound
 * pass and the victim's copies in the inbound pass, so the two views of a
 * flood only line up by trigger ordinal, never by noise line.
 */
export class BotPortCounter {
  private emitted = 0;

  get count(): number {
    return this.emitted;
  }

  next(digest: Uint8Array): number {
    let current = this.emitted;
    for (let i = 2; i <= 10; i++) {
      current += digest[i];
    }
    this.emitted++;
    return BOT_PORT_BASE + (current % BOT_PORT_SPAN);
  }
}

type FlowTiming = Pick<FlowRecord, "startTime" | "duration" | "endTime" | "startedAt">;

/** Duration and end time both derive from one whole-millisecond span. */
function flowTiming(baseStart: number, offsetMs: number, seconds: number): FlowTiming {
  const startedAt = baseStart + offsetMs;
  const spanMs = durationMillis(seconds);
  return {
    startedAt,
    startTime: formatTimestamp(startedAt),
    duration: formatDuration(spanMs / 1000),
    endTime: formatTimestamp(startedAt + spanMs),
  };
}

/** Fresh record: every column from `fields`, the sensor from `base`. */
function deriveFlow(base: FlowRecord, fields: Omit<FlowRecord, "sensor">): FlowRecord {
  return Object.freeze({ ...fields, sensor: base.sensor });
}

export class AttackSynthesizer {
  private readonly victim: VantagePoint | null;

  constructor(
    private readonly topology: AttackTopology,
    private readonly random: RandomSource = mathRandom,
  ) {
    this.victim = validateTopology(topology);
  }

  get victimVantagePoint(): VantagePoint | null {
    return this.victim;
  }

  /**
   * All attack flows one trigger adds for `vp`, in emission order:
   * amplifiers, bots, the victim's aggregate, probes.
   */
  synthesize(
    base: FlowRecord,
    vp: VantagePoint,
    direction: Direction,
    ports: BotPortCounter,
  ): SyntheticFlow[] {
    const start = base.startedAt;
    if (start === null) return [];

    const own: SinkKey = { vantagePoint: vp.name, direction };
    const tag = (kind: AttackKind, sink: SinkKey) => (record: FlowRecord): SyntheticFlow => ({
      kind,
      sink,
      record,
    });

    const flows: SyntheticFlow[] = [];
    if (vp.hasAmplifiers) {
      flows.push(...this.amplifierFlows(base, start, vp, direction).map(tag("amplifier", own)));
    }
    if (vp.hasBots) {
      flows.push(...this.botFlows(base, start, vp, direction, ports).map(tag("bot", own)));
    }
    if (this.victim && vp.name === this.victim.name) {
      const victimInbound: SinkKey = { vantagePoint: this.victim.name, direction: "inbound" };
      flows.push(
        ...this.victimFlows(base, start, vp, direction, ports).map(tag("victim", victimInbound)),
      );
    }
    if (this.topology.probes.enabled) {
      flows.push(...this.probeFlows(base, start, vp, direction).map(tag("probe", own)));
    }
    return flows;
  }

  /**
   * Inbound: the spoofed query from the victim into each amplifier.
   * Outbound: the amplified response back to the victim.
   */
  amplifierFlows(
    base: FlowRecord,
    start: number,
    vp: VantagePoint,
    direction: Direction,
  ): FlowRecord[] {
    const victimAddress = this.requireVictimAddress();
    const { reflection } = this.topology;

    return range(this.topology.amplifiersPerNode).map((i) => {
      const amplifier = amplifierAddress(vp, i);
      const timing = flowTiming(start, AMPLIFIER_STEP_MS * (1 + i), this.topology.flowDuration);

      if (direction === "outbound") {
        return this.reflectedFlow(base, timing, amplifier, victimAddress);
      }

      return deriveFlow(base, {
        ...timing,
        srcAddr: victimAddress,
        dstAddr: amplifier,
        srcPort: String(reflection.clientPort),
        dstPort: String(reflection.servicePort),
        protocol: PROTO_UDP,
        packets: String(jitter(this.random, reflection.inputPacketsPerFlow)),
        bytes: String(jitter(this.random, reflection.inputBytesPerFlow)),
        flags: NO_FLAGS,
      });
    });
  }

  /** Outbound floods only; whatever commands the bots inbound is not modeled. */
  botFlows(
    base: FlowRecord,
    start: number,
    vp: VantagePoint,
    direction: Direction,
    ports: BotPortCounter,
  ): FlowRecord[] {
    if (direction === "inbound") return [];
    const victimAddress = this.requireVictimAddress();

    return range(this.topology.botsPerNode).map((i) =>
      this.floodFlow(base, start, vp, i, victimAddress, ports),
    );
  }

  /**
   * The victim's inbound view: every amplifier response and bot flood of
   * every attacking vantage point, recomputed rather than copied.
   */
  victimFlows(
    base: FlowRecord,
    start: number,
    vp: VantagePoint,
    direction: Direction,
    ports: BotPortCounter,
  ): FlowRecord[] {
    const victim = this.victim;
    if (direction !== "inbound" || !victim || vp.name !== victim.name) return [];
    const victimAddress = this.requireVictimAddress();
    const attackers = this.topology.vantagePoints.filter((other) => other.name !== victim.name);

    const flows: FlowRecord[] = [];
    for (const source of attackers) {
      if (!source.hasAmplifiers) continue;
      for (const i of range(this.topology.amplifiersPerNode)) {
        const timing = flowTiming(start, AMPLIFIER_STEP_MS * (1 + i), this.topology.flowDuration);
        flows.push(this.reflectedFlow(base, timing, amplifierAddress(source, i), victimAddress));
      }
    }
    for (const source of attackers) {
      if (!source.hasBots) continue;
      for (const i of range(this.topology.botsPerNode)) {
        flows.push(this.floodFlow(base, start, source, i, victimAddress, ports));
      }
    }
    return flows;
  }

  /** SYN-only scans from random sources into random hosts of `vp`. */
  probeFlows(
    base: FlowRecord,
    start: number,
    vp: VantagePoint,
    direction: Direction,
  ): FlowRecord[] {
    const { probes } = this.topology;
    if (direction !== "inbound" || !probes.enabled) return [];

    return range(probes.perTimestep).map((i) => {
      const timing = flowTiming(start, PROBE_STEP_MS * (1 + i), probes.duration);
      const srcAddr = randomAddress(this.random);
      const dstAddr = randomAddress(this.random, vp.prefix);
      const srcPort = this.random.int(EPHEMERAL_PORT_MIN, EPHEMERAL_PORT_MAX);

      return deriveFlow(base, {
        ...timing,
        srcAddr,
        dstAddr,
        srcPort: String(srcPort),
        dstPort: String(probes.dstPort),
        protocol: PROTO_TCP,
        packets: String(1 + probes.duration),
        bytes: String(PROBE_BYTES_PER_PACKET * (1 + probes.duration)),
        flags: SYN_ONLY_FLAGS,
      });
    });
  }

  private reflectedFlow(
    base: FlowRecord,
    timing: FlowTiming,
    amplifier: string,
    victimAddress: string,
  ): FlowRecord {
    const { reflection } = this.topology;
    return deriveFlow(base, {
      ...timing,
      srcAddr: amplifier,
      dstAddr: victimAddress,
      srcPort: String(reflection.servicePort),
      dstPort: String(reflection.clientPort),
      protocol: PROTO_UDP,
      packets: String(jitter(this.random, reflection.outputPacketsPerFlow)),
      bytes: String(jitter(this.random, reflection.outputBytesPerFlow)),
      flags: NO_FLAGS,
    });
  }

  private floodFlow(
    base: FlowRecord,
    start: number,
    source: VantagePoint,
    index: number,
    victimAddress: string,
    ports: BotPortCounter,
  ): FlowRecord {
    const { bots } = this.topology;
    const timing = flowTiming(start, BOT_STEP_MS * (1 + index), this.topology.flowDuration);
    return deriveFlow(base, {
      ...timing,
      srcAddr: botAddress(source, index),
      dstAddr: victimAddress,
      srcPort: String(ports.next(botDigest(source, index))),
      dstPort: String(bots.dstPort),
      protocol: PROTO_UDP,
      packets: String(jitter(this.random, bots.outputPacketsPerFlow)),
      bytes: String(jitter(this.random, bots.outputBytesPerFlow)),
      flags: NO_FLAGS,
    });
  }

  private requireVictimAddress(): string {
    const address = this.victim?.victimAddress;
    if (!address) {
      throw new ConfigurationError("Attack flows need a vantage point with a victim address");
    }
    return address;
  }
}
