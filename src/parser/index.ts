import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import * as zlib from "node:zlib";
import type { Direction, FlowRecord } from "../types.js";
import { ConfigurationError } from "../errors.js";
import { isHeaderRecord, parseFlowLine } from "./record.js";

export {
  FIELD_DELIMITER,
  durationMillis,
  formatDuration,
  formatTimestamp,
  isHeaderRecord,
  parseFlowLine,
  parseTimestamp,
  serializeFlowRecord,
} from "./record.js";

/** Stream the raw lines of a flow log, gunzipping `.gz` files on the fly. */
export async function* readFlowLines(logPath: string): AsyncGenerator<string> {
  let inputStream: NodeJS.ReadableStream;
  if (logPath.endsWith(".gz")) {
    inputStream = fs.createReadStream(logPath).pipe(zlib.createGunzip());
  } else {
    inputStream = fs.createReadStream(logPath);
  }

  const rl = readline.createInterface({
    input: inputStream,
    crlfDelay: Infinity,
  });

  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

/** All data records of a flow log; header and blank lines are dropped. */
export async function readFlowFile(logPath: string): Promise<FlowRecord[]> {
  const records: FlowRecord[] = [];
  for await (const line of readFlowLines(logPath)) {
    if (!line.trim()) continue;
    const record = parseFlowLine(line);
    if (!isHeaderRecord(record)) {
      records.push(record);
    }
  }
  return records;
}

/**
 * The noise file for one direction: `<dir>/inbound` or `<dir>/outbound`,
 * falling back to a gzipped copy.
 */
export function resolveNoisePath(datasetDir: string, direction: Direction): string {
  const plainPath = path.join(datasetDir, direction);
  if (fs.existsSync(plainPath)) {
    return plainPath;
  }

  const gzPath = plainPath + ".gz";
  if (fs.existsSync(gzPath)) {
    return gzPath;
  }

  throw new ConfigurationError(
    `Noise dataset "${datasetDir}" must contain a file named "${direction}" (or "${direction}.gz")`,
  );
}
