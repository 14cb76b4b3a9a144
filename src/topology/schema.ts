import { z } from "zod";
import type { AttackTopology } from "../types.js";

const octet = "(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";

const port = z.number().int().min(0).max(65535);
const count = z.number().int().min(0);

export const vantagePointSchema = z.object({
  prefix: z
    .string()
    .regex(new RegExp(`^${octet}\\.${octet}$`), "must be two octets, e.g. 172.16")
    .describe("Network prefix owning every address of this view"),
  name: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, "may only contain letters, digits, '.', '_' and '-'")
    .describe("Vantage point name, also used in output file names"),
  hasAmplifiers: z.boolean().default(false),
  hasBots: z.boolean().default(false),
  victimAddress: z.string().ip({ version: "v4" }).nullable().default(null),
});

export const topologySchema: z.ZodType<AttackTopology, z.ZodTypeDef, unknown> = z.object({
  vantagePoints: z.array(vantagePointSchema).min(1),
  amplifiersPerNode: count,
  botsPerNode: count,
  syntheticInterval: count,
  flowDuration: z.number().min(0),
  probes: z.object({
    enabled: z.boolean(),
    perTimestep: count,
    duration: count,
    dstPort: port,
  }),
  reflection: z.object({
    servicePort: port,
    clientPort: port,
    inputPacketsPerFlow: count,
    inputBytesPerFlow: count,
    outputPacketsPerFlow: count,
    outputBytesPerFlow: count,
  }),
  bots: z.object({
    dstPort: port,
    outputPacketsPerFlow: count,
    outputBytesPerFlow: count,
  }),
});
