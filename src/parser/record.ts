import {
  FIELD_WIDTHS,
  FLOW_FIELDS,
  HEADER_SOURCE_MARKER,
  HEADER_START_TIME_MARKER,
  type FlowRecord,
} from "../types.js";
import { ParseError } from "../errors.js";

export const FIELD_DELIMITER = "|";

const TIMESTAMP_PATTERN =
  /^(\d{4})\/(\d{2})\/(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})$/;

/**
 * Parse one delimited flow line. Every field but the flags is trimmed; the
 * flags keep their fixed-width layout. The trailing delimiter the dump tool
 * writes yields an empty final field, which is dropped.
 */
export function parseFlowLine(line: string): FlowRecord {
  const parts = line.replace(/\r?\n$/, "").split(FIELD_DELIMITER);

  if (parts.length === FLOW_FIELDS.length + 1 && parts[parts.length - 1].trim() === "") {
    parts.pop();
  }

  if (parts.length !== FLOW_FIELDS.length) {
    throw new ParseError(
      `expected ${FLOW_FIELDS.length} fields, found ${parts.length}`,
      line,
    );
  }

  const [
    srcAddr,
    dstAddr,
    srcPort,
    dstPort,
    protocol,
    packets,
    bytes,
    flags,
    startTime,
    duration,
    endTime,
    sensor,
  ] = parts.map((value, i) => (FLOW_FIELDS[i] === "flags" ? value : value.trim()));

  let startedAt: number | null = null;
  if (startTime !== HEADER_START_TIME_MARKER) {
    startedAt = parseTimestamp(startTime);
    if (startedAt === null) {
      throw new ParseError(`unparsable start time "${startTime}"`, line);
    }
  }

  return {
    srcAddr,
    dstAddr,
    srcPort,
    dstPort,
    protocol,
    packets,
    bytes,
    flags,
    startTime,
    duration,
    endTime,
    sensor,
    startedAt,
  };
}

export function isHeaderRecord(record: FlowRecord): boolean {
  return record.srcAddr === HEADER_SOURCE_MARKER;
}

/** Fixed-width line, right-justified per column, flags untouched. */
export function serializeFlowRecord(record: FlowRecord): string {
  const columns = FLOW_FIELDS.map((field) => {
    const width = FIELD_WIDTHS[field];
    return width > 0 ? record[field].padStart(width) : record[field];
  });
  return columns.join(FIELD_DELIMITER) + FIELD_DELIMITER + "\n";
}

/**
 * `YYYY/MM/DDTHH:MM:SS.f` read as UTC. Fractions of up to six digits are
 * accepted and truncated to whole milliseconds.
 */
export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac] = match;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10);
  const day = parseInt(d, 10);
  const hour = parseInt(h, 10);
  const minute = parseInt(mi, 10);
  const second = parseInt(s, 10);
  const millis = Math.floor(parseInt(frac.padEnd(6, "0"), 10) / 1000);

  const ms = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const date = new Date(ms);

  // Date.UTC rolls over out-of-range parts (month 13, second 61); reject those.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  return ms;
}

export function formatTimestamp(ms: number): string {
  const date = new Date(ms);
  const y = String(date.getUTCFullYear()).padStart(4, "0");
  const mo = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  const h = String(date.getUTCHours()).padStart(2, "0");
  const mi = String(date.getUTCMinutes()).padStart(2, "0");
  const s = String(date.getUTCSeconds()).padStart(2, "0");
  const frac = String(date.getUTCMilliseconds()).padStart(3, "0");
  return `${y}/${mo}/${d}T${h}:${mi}:${s}.${frac}`;
}

export function formatDuration(seconds: number): string {
  return seconds.toFixed(3);
}

export function durationMillis(seconds: number): number {
  return Math.round(seconds * 1000);
}
