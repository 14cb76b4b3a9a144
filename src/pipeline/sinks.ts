import * as fs from "node:fs";
import * as path from "node:path";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import { DIRECTIONS, type AttackTopology, type Direction } from "../types.js";
import { ResourceError, errorMessage } from "../errors.js";

/** Append-only destination for serialized flow lines. */
export interface FlowSink {
  /** Returns false once the sink wants the caller to wait on `flush`. */
  write(line: string): boolean;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export type DirectionalSinks = Readonly<Record<Direction, FlowSink>>;

/** Vantage point name to its own inbound and outbound sinks. */
export type SinkMap = ReadonlyMap<string, DirectionalSinks>;

export class FileFlowSink implements FlowSink {
  private readonly stream: fs.WriteStream;
  private failure: Error | null = null;

  constructor(readonly filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: "wx", encoding: "utf8" });
    this.stream.on("error", (error) => {
      this.failure = error;
    });
  }

  write(line: string): boolean {
    this.throwIfFailed();
    return this.stream.write(line);
  }

  async flush(): Promise<void> {
    this.throwIfFailed();
    if (this.stream.writableNeedDrain) {
      await once(this.stream, "drain");
    }
  }

  async close(): Promise<void> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    try {
      await finished(this.stream);
    } catch (error) {
      throw new ResourceError(`Cannot write ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new ResourceError(`Cannot write ${this.filePath}: ${this.failure.message}`);
    }
  }
}

/** Collects lines in memory; used for previews and tests. */
export class MemoryFlowSink implements FlowSink {
  readonly lines: string[] = [];
  closed = false;

  write(line: string): boolean {
    if (this.closed) {
      throw new ResourceError("write after close");
    }
    this.lines.push(line);
    return true;
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function outputFileName(vantagePoint: string, direction: Direction): string {
  return `${vantagePoint}-${direction}.tuc`;
}

export interface OutputSinks {
  sinks: SinkMap;
  files: string[];
}

/**
 * Create `outputDir` and one exclusive file sink per (vantage point,
 * direction). An existing directory is never reused.
 */
export function openOutputSinks(outputDir: string, topology: AttackTopology): OutputSinks {
  if (fs.existsSync(outputDir)) {
    throw new ResourceError(
      `The output path "${outputDir}" already exists. Aborting, not clobbering existing results.`,
    );
  }

  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw new ResourceError(`Cannot create output directory "${outputDir}": ${errorMessage(error)}`);
  }

  const sinks = new Map<string, DirectionalSinks>();
  const files: string[] = [];

  for (const vp of topology.vantagePoints) {
    const [inboundPath, outboundPath] = DIRECTIONS.map((direction) =>
      path.join(outputDir, outputFileName(vp.name, direction)),
    );
    sinks.set(vp.name, {
      inbound: new FileFlowSink(inboundPath),
      outbound: new FileFlowSink(outboundPath),
    });
    files.push(inboundPath, outboundPath);
  }

  return { sinks, files };
}

export function memorySinks(topology: AttackTopology): Map<string, Record<Direction, MemoryFlowSink>> {
  return new Map(
    topology.vantagePoints.map((vp) => [
      vp.name,
      { inbound: new MemoryFlowSink(), outbound: new MemoryFlowSink() },
    ]),
  );
}

export function allSinks(sinks: SinkMap): FlowSink[] {
  return [...sinks.values()].flatMap((pair) => DIRECTIONS.map((direction) => pair[direction]));
}

export async function flushSinks(sinks: SinkMap): Promise<void> {
  await Promise.all(allSinks(sinks).map((sink) => sink.flush()));
}

/**
 * Close every sink, even when some fail, then rethrow the first failure.
 */
export async function closeSinks(
  sinks: SinkMap,
  log: (message: string) => void,
): Promise<void> {
  const failures: unknown[] = [];
  for (const [name, pair] of sinks) {
    const results = await Promise.allSettled(DIRECTIONS.map((direction) => pair[direction].close()));
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (rejected.length === 0) {
      log(`Closed result files for ${name}`);
    } else {
      failures.push(...rejected.map((result) => result.reason));
    }
  }

  if (failures.length > 0) {
    const [first] = failures;
    throw first instanceof Error ? first : new ResourceError(errorMessage(first));
  }
}

/**
 * Run `body`, then close the sinks. A close failure is reported only when
 * `body` succeeded; otherwise it is logged and the body's error propagates.
 */
export async function withOpenSinks<T>(
  sinks: SinkMap,
  log: (message: string) => void,
  body: () => Promise<T>,
): Promise<T> {
  let result: T;
  try {
    result = await body();
  } catch (error) {
    try {
      await closeSinks(sinks, log);
    } catch (closeError) {
      log(`Failed to close result files: ${errorMessage(closeError)}`);
    }
    throw error;
  }

  await closeSinks(sinks, log);
  return result;
}
