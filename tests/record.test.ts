import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as zlib from "node:zlib";
import {
  durationMillis,
  formatDuration,
  formatTimestamp,
  isHeaderRecord,
  parseFlowLine,
  parseTimestamp,
  serializeFlowRecord,
} from "../src/parser/record.js";
import { readFlowFile, readFlowLines, resolveNoisePath } from "../src/parser/index.js";
import { ConfigurationError, ParseError } from "../src/errors.js";
import { HEADER_LINE, NOISE_DIR, SAMPLE_LINE } from "./fixtures.js";

const PADDED_SAMPLE =
  "                               10.1.1.5|                          93.184.216.34| 1234|   80|  6|         3|       180| S      |2024/01/01T00:00:00.000|    0.010|2024/01/01T00:00:00.010| S0|";

describe("Flow line parser", () => {
  it("should parse a data line into its twelve fields", () => {
    const record = parseFlowLine(SAMPLE_LINE);

    expect(record.srcAddr).toBe("10.1.1.5");
    expect(record.dstAddr).toBe("93.184.216.34");
    expect(record.srcPort).toBe("1234");
    expect(record.dstPort).toBe("80");
    expect(record.protocol).toBe("6");
    expect(record.packets).toBe("3");
    expect(record.bytes).toBe("180");
    expect(record.startTime).toBe("2024/01/01T00:00:00.000");
    expect(record.duration).toBe("0.010");
    expect(record.endTime).toBe("2024/01/01T00:00:00.010");
    expect(record.sensor).toBe("S0");
    expect(record.startedAt).toBe(Date.UTC(2024, 0, 1));
  });

  it("should trim padded columns but keep the flags layout", () => {
    const record = parseFlowLine(PADDED_SAMPLE);
    expect(record.srcAddr).toBe("10.1.1.5");
    expect(record.srcPort).toBe("1234");
    expect(record.sensor).toBe("S0");
    expect(record.flags).toBe(" S      ");
  });

  it("should accept a line without the trailing delimiter", () => {
    const record = parseFlowLine(SAMPLE_LINE.slice(0, -1));
    expect(record.sensor).toBe("S0");
  });

  it("should strip a trailing newline", () => {
    expect(parseFlowLine(SAMPLE_LINE + "\r\n").sensor).toBe("S0");
  });

  it("should recognize the header line", () => {
    const record = parseFlowLine(HEADER_LINE);
    expect(isHeaderRecord(record)).toBe(true);
    expect(record.startedAt).toBeNull();
    expect(record.flags).toBe("   flags");
    expect(isHeaderRecord(parseFlowLine(SAMPLE_LINE))).toBe(false);
  });

  it("should reject lines with the wrong number of fields", () => {
    expect(() => parseFlowLine("a|b|c")).toThrow(ParseError);
    expect(() => parseFlowLine("a|b|c")).toThrow("expected 12 fields, found 3");
    expect(() => parseFlowLine(SAMPLE_LINE + "extra|")).toThrow("expected 12 fields, found 14");
    expect(() => parseFlowLine(SAMPLE_LINE + "extra")).toThrow("expected 12 fields, found 13");
  });

  it("should reject an unparsable start time", () => {
    const line = SAMPLE_LINE.replace("2024/01/01T00:00:00.000", "2024/13/01T00:00:00.000");
    expect(() => parseFlowLine(line)).toThrow('unparsable start time "2024/13/01T00:00:00.000"');
  });

  it("should keep the offending line on the parse error", () => {
    try {
      parseFlowLine("a|b|c");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.line).toBe("a|b|c");
        expect(error.atLine(7).message).toBe("line 7: expected 12 fields, found 3");
      }
    }
  });
});

describe("Flow line serializer", () => {
  it("should right-justify every column to its fixed width", () => {
    expect(serializeFlowRecord(parseFlowLine(SAMPLE_LINE))).toBe(PADDED_SAMPLE + "\n");
  });

  it("should reproduce a dump-formatted header", () => {
    expect(serializeFlowRecord(parseFlowLine(HEADER_LINE))).toBe(HEADER_LINE + "\n");
  });
});

describe("Timestamps", () => {
  it("should parse timestamps as UTC milliseconds", () => {
    expect(parseTimestamp("2024/01/01T00:00:00.010")).toBe(Date.UTC(2024, 0, 1, 0, 0, 0, 10));
    expect(parseTimestamp("2024/06/30T23:59:59.5")).toBe(Date.UTC(2024, 5, 30, 23, 59, 59, 500));
  });

  it("should truncate microsecond fractions to milliseconds", () => {
    expect(parseTimestamp("2024/01/01T00:00:00.123456")).toBe(Date.UTC(2024, 0, 1, 0, 0, 0, 123));
  });

  it("should reject malformed or out-of-range timestamps", () => {
    expect(parseTimestamp("2024/01/01T00:00:00")).toBeNull();
    expect(parseTimestamp("2024-01-01T00:00:00.000")).toBeNull();
    expect(parseTimestamp("2024/02/30T00:00:00.000")).toBeNull();
    expect(parseTimestamp("2024/01/01T24:00:00.000")).toBeNull();
  });

  it("should format milliseconds with three fraction digits", () => {
    expect(formatTimestamp(Date.UTC(2024, 0, 1, 23, 59, 59, 999) + 55_000)).toBe(
      "2024/01/02T00:00:54.999",
    );
    expect(formatTimestamp(Date.UTC(2024, 2, 5, 7, 8, 9, 4))).toBe("2024/03/05T07:08:09.004");
  });

  it("should format durations and convert them to milliseconds", () => {
    expect(formatDuration(55)).toBe("55.000");
    expect(formatDuration(0.01)).toBe("0.010");
    expect(durationMillis(55)).toBe(55_000);
    expect(durationMillis(0.01)).toBe(10);
  });
});

describe("Noise log reader", () => {
  it("should read the data records of a noise log", async () => {
    const records = await readFlowFile(path.join(NOISE_DIR, "inbound"));

    expect(records).toHaveLength(7);
    expect(records[0].srcAddr).toBe("93.184.216.34");
    expect(records[0].dstAddr).toBe("10.1.1.5");
    expect(records[6].startTime).toBe("2024/01/01T00:00:06.300");
  });

  it("should read gzipped logs", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgen-reader-"));
    try {
      const gzPath = path.join(dir, "inbound.gz");
      fs.writeFileSync(gzPath, zlib.gzipSync(`${HEADER_LINE}\n${SAMPLE_LINE}\n`));

      const lines: string[] = [];
      for await (const line of readFlowLines(gzPath)) {
        lines.push(line);
      }
      expect(lines).toEqual([HEADER_LINE, SAMPLE_LINE]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should resolve plain and gzipped noise files", () => {
    expect(resolveNoisePath(NOISE_DIR, "outbound")).toBe(path.join(NOISE_DIR, "outbound"));

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgen-resolve-"));
    try {
      fs.writeFileSync(path.join(dir, "inbound.gz"), zlib.gzipSync(""));
      expect(resolveNoisePath(dir, "inbound")).toBe(path.join(dir, "inbound.gz"));
      expect(() => resolveNoisePath(dir, "outbound")).toThrow(ConfigurationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
