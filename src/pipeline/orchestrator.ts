import {
  ATTACK_KINDS,
  DIRECTIONS,
  type AttackKind,
  type AttackTopology,
  type Direction,
  type FlowRecord,
} from "../types.js";
import type { ParseErrorPolicy } from "../config.js";
import { ParseError, ResourceError } from "../errors.js";
import { isHeaderRecord, parseFlowLine, serializeFlowRecord } from "../parser/record.js";
import { anonymizeRecord } from "../synth/anonymizer.js";
import { AttackSynthesizer, BotPortCounter, type SinkKey } from "../synth/attacks.js";
import { mathRandom, type RandomSource } from "../synth/random.js";
import { flushSinks, type FlowSink, type SinkMap } from "./sinks.js";

export interface OrchestratorOptions {
  random?: RandomSource;
  parseErrors?: ParseErrorPolicy;
  log?: (message: string) => void;
}

export interface DirectionStats {
  direction: Direction;
  linesRead: number;
  headerLines: number;
  skippedLines: number;
  triggers: number;
  realFlows: number;
  syntheticFlows: Record<AttackKind, number>;
}

/** Opens the noise stream for one direction pass. */
export type NoiseSource = (direction: Direction) => AsyncIterable<string> | Iterable<string>;

/**
 * Fans every noise record out to every vantage point, one full pass per
 * direction, and layers attack flows onto the triggering records.
 */
export class FlowOrchestrator {
  private readonly synthesizer: AttackSynthesizer;
  private readonly parseErrors: ParseErrorPolicy;
  private readonly log: (message: string) => void;

  constructor(
    private readonly topology: AttackTopology,
    private readonly sinks: SinkMap,
    options: OrchestratorOptions = {},
  ) {
    this.synthesizer = new AttackSynthesizer(topology, options.random ?? mathRandom);
    this.parseErrors = options.parseErrors ?? "abort";
    this.log = options.log ?? console.error;

    for (const vp of topology.vantagePoints) {
      if (!sinks.has(vp.name)) {
        throw new ResourceError(`No output sinks for vantage point "${vp.name}"`);
      }
    }
  }

  async run(open: NoiseSource): Promise<DirectionStats[]> {
    const stats: DirectionStats[] = [];
    for (const direction of DIRECTIONS) {
      stats.push(await this.processDirection(open(direction), direction));
    }
    return stats;
  }

  async processDirection(
    lines: AsyncIterable<string> | Iterable<string>,
    direction: Direction,
  ): Promise<DirectionStats> {
    this.log(`Processing ${direction}...`);

    const stats = emptyStats(direction);
    const ports = new BotPortCounter();
    const interval = this.topology.syntheticInterval;
    let counter = 0;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (!line.trim()) continue;
      stats.linesRead++;

      let triggered: boolean;
      if (counter > interval) {
        triggered = true;
        counter = 1;
      } else {
        triggered = false;
        counter++;
      }

      let record: FlowRecord;
      try {
        record = parseFlowLine(line);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        const located = error.atLine(lineNumber);
        if (this.parseErrors === "abort") throw located;
        this.log(`Skipping ${direction} ${located.message}`);
        stats.skippedLines++;
        continue;
      }

      const header = isHeaderRecord(record);
      if (header) {
        stats.headerLines++;
      } else if (triggered) {
        stats.triggers++;
      }

      let backlogged = false;
      const emit = (key: SinkKey, out: FlowRecord): void => {
        if (!this.sinkFor(key).write(serializeFlowRecord(out))) {
          backlogged = true;
        }
      };

      for (const vp of this.topology.vantagePoints) {
        const rewritten = anonymizeRecord(record, direction, vp);
        emit({ vantagePoint: vp.name, direction }, rewritten);
        if (header) continue;
        stats.realFlows++;
        if (!triggered) continue;

        for (const flow of this.synthesizer.synthesize(rewritten, vp, direction, ports)) {
          emit(flow.sink, flow.record);
          stats.syntheticFlows[flow.kind]++;
        }
      }

      if (backlogged) {
        await flushSinks(this.sinks);
      }
    }

    await flushSinks(this.sinks);
    this.log(formatStats(stats));
    return stats;
  }

  private sinkFor(key: SinkKey): FlowSink {
    const pair = this.sinks.get(key.vantagePoint);
    if (!pair) {
      throw new ResourceError(`No output sinks for vantage point "${key.vantagePoint}"`);
    }
    return pair[key.direction];
  }
}

function emptyStats(direction: Direction): DirectionStats {
  return {
    direction,
    linesRead: 0,
    headerLines: 0,
    skippedLines: 0,
    triggers: 0,
    realFlows: 0,
    syntheticFlows: { amplifier: 0, bot: 0, victim: 0, probe: 0 },
  };
}

export function formatStats(stats: DirectionStats): string {
  const synthetic = ATTACK_KINDS.map((kind) => `${kind}=${stats.syntheticFlows[kind]}`).join(" ");
  return (
    `${stats.direction}: ${stats.linesRead} lines, ${stats.triggers} triggers, ` +
    `${stats.realFlows} real flows, synthetic ${synthetic}` +
    (stats.skippedLines > 0 ? `, ${stats.skippedLines} skipped` : "")
  );
}
