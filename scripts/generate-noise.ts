import * as fs from "node:fs";
import * as path from "node:path";
import type { Direction, FlowRecord } from "../src/types.js";
import { NO_FLAGS, PROTO_TCP, PROTO_UDP } from "../src/types.js";
import {
  durationMillis,
  formatDuration,
  formatTimestamp,
  serializeFlowRecord,
} from "../src/parser/record.js";

interface GeneratorConfig {
  outputDir: string;
  startTime: number;
  durationHours: number;
  flowsPerHour: number;
  sensor: string;
}

const defaultConfig: GeneratorConfig = {
  outputDir: path.join(process.cwd(), "generated-noise"),
  startTime: Date.UTC(2024, 0, 1),
  durationHours: 1,
  flowsPerHour: 2000,
  sensor: "S0",
};

const internalHosts = ["10.1.1.5", "10.1.1.17", "10.1.2.40", "10.1.3.9", "10.1.4.120", "10.1.5.33"];
const externalHosts = [
  "93.184.216.34", "151.101.1.140", "140.82.121.6", "8.8.8.8",
  "8.8.4.4", "1.1.1.1", "104.16.0.1", "13.107.42.14",
];

interface ServiceProfile {
  port: number;
  protocol: string;
  flags: string;
  packets: [number, number];
  bytesPerPacket: [number, number];
  seconds: [number, number];
}

const services: ServiceProfile[] = [
  { port: 443, protocol: PROTO_TCP, flags: "FSPA    ", packets: [8, 400], bytesPerPacket: [60, 1400], seconds: [0, 120] },
  { port: 80, protocol: PROTO_TCP, flags: "FSPA    ", packets: [5, 80], bytesPerPacket: [60, 1200], seconds: [0, 30] },
  { port: 53, protocol: PROTO_UDP, flags: NO_FLAGS, packets: [1, 2], bytesPerPacket: [60, 300], seconds: [0, 0] },
  { port: 22, protocol: PROTO_TCP, flags: "FSPA    ", packets: [20, 2000], bytesPerPacket: [60, 200], seconds: [5, 900] },
  { port: 25, protocol: PROTO_TCP, flags: "FSPA    ", packets: [10, 60], bytesPerPacket: [60, 800], seconds: [0, 20] },
];

const HEADER: FlowRecord = {
  srcAddr: "sIP",
  dstAddr: "dIP",
  srcPort: "sPort",
  dstPort: "dPort",
  protocol: "pro",
  packets: "packets",
  bytes: "bytes",
  flags: "   flags",
  startTime: "sTime",
  duration: "duration",
  endTime: "eTime",
  sensor: "sen",
  startedAt: null,
};

function randomElement<T>(arr: readonly T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function generateFlows(config: GeneratorConfig, direction: Direction): FlowRecord[] {
  const total = config.flowsPerHour * config.durationHours;
  const starts = Array.from(
    { length: total },
    () => config.startTime + Math.floor(Math.random() * config.durationHours * 3600_000),
  ).sort((a, b) => a - b);

  return starts.map((startedAt) => {
    const service = randomElement(services);
    const internal = randomElement(internalHosts);
    const external = randomElement(externalHosts);
    const ephemeral = randomInt(1024, 65535);
    const packets = randomInt(...service.packets);
    const seconds = randomInt(service.seconds[0] * 1000, service.seconds[1] * 1000) / 1000;

    // Inbound noise is remote clients reaching our services; outbound is our clients going out.
    const [srcAddr, dstAddr, srcPort, dstPort] =
      direction === "inbound"
        ? [external, internal, ephemeral, service.port]
        : [internal, external, ephemeral, service.port];

    return {
      srcAddr,
      dstAddr,
      srcPort: String(srcPort),
      dstPort: String(dstPort),
      protocol: service.protocol,
      packets: String(packets),
      bytes: String(packets * randomInt(...service.bytesPerPacket)),
      flags: service.flags,
      startTime: formatTimestamp(startedAt),
      duration: formatDuration(seconds),
      endTime: formatTimestamp(startedAt + durationMillis(seconds)),
      sensor: config.sensor,
      startedAt,
    };
  });
}

function main(): void {
  const config = { ...defaultConfig };

  const outArg = process.argv.find((a) => a.startsWith("--output="));
  if (outArg) {
    config.outputDir = outArg.split("=")[1];
  }

  const flowsArg = process.argv.find((a) => a.startsWith("--flows-per-hour="));
  if (flowsArg) {
    config.flowsPerHour = parseInt(flowsArg.split("=")[1], 10);
  }

  if (!fs.existsSync(config.outputDir)) {
    fs.mkdirSync(config.outputDir, { recursive: true });
  }

  for (const direction of ["inbound", "outbound"] as const) {
    const records = [HEADER, ...generateFlows(config, direction)];
    const filepath = path.join(config.outputDir, direction);
    fs.writeFileSync(filepath, records.map(serializeFlowRecord).join(""));
    console.log(`Generated ${filepath} (${records.length - 1} flows)`);
  }

  console.log(`\nNoise dataset written to ${config.outputDir}`);
  console.log(`Time range: ${new Date(config.startTime).toISOString()} to ${new Date(config.startTime + config.durationHours * 3600_000).toISOString()}`);
}

main();
