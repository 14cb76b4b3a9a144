import * as fs from "node:fs/promises";
import type { AttackTopology, VantagePoint } from "../types.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { topologySchema } from "./schema.js";

export { topologySchema, vantagePointSchema } from "./schema.js";

export async function loadTopology(topologyPath: string): Promise<AttackTopology> {
  let text: string;
  try {
    text = await fs.readFile(topologyPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read topology "${topologyPath}": ${errorMessage(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Topology "${topologyPath}" is not valid JSON: ${errorMessage(error)}`,
    );
  }

  const topology = parseTopology(raw);
  validateTopology(topology);
  return topology;
}

export function parseTopology(raw: unknown): AttackTopology {
  const result = topologySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid topology: ${issues}`);
  }
  return result.data;
}

/**
 * Check the cross-field rules the schema cannot express and return the
 * victim vantage point, if any. Has no side effects.
 */
export function validateTopology(topology: AttackTopology): VantagePoint | null {
  const names = new Set<string>();
  for (const vp of topology.vantagePoints) {
    if (names.has(vp.name)) {
      throw new ConfigurationError(
        `Error in topology: vantage point name "${vp.name}" is used more than once`,
      );
    }
    names.add(vp.name);
  }

  const victims = topology.vantagePoints.filter((vp) => vp.victimAddress !== null);
  if (victims.length > 1) {
    throw new ConfigurationError(
      `Error in topology: only one victim is allowed, found ${victims.map((vp) => vp.name).join(", ")}`,
    );
  }

  const victim = victims[0] ?? null;
  if (victim && (victim.hasAmplifiers || victim.hasBots)) {
    throw new ConfigurationError(
      `Error in topology: victim "${victim.name}" should not contain attackers`,
    );
  }

  const hasAttackers = topology.vantagePoints.some((vp) => vp.hasAmplifiers || vp.hasBots);
  if (hasAttackers && !victim) {
    throw new ConfigurationError(
      "Error in topology: amplifiers or bots are declared but no vantage point has a victim address",
    );
  }

  return victim;
}

export function findVantagePoint(
  topology: AttackTopology,
  name: string,
): VantagePoint {
  const vp = topology.vantagePoints.find((candidate) => candidate.name === name);
  if (!vp) {
    throw new ConfigurationError(
      `Unknown vantage point "${name}". Known: ${topology.vantagePoints.map((c) => c.name).join(", ")}`,
    );
  }
  return vp;
}
