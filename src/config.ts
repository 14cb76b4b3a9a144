import { fileURLToPath } from "node:url";
import { ConfigurationError } from "./errors.js";

export type ParseErrorPolicy = "abort" | "skip";

export interface FlowgenConfig {
  topologyPath: string;
  datasetDir?: string;
  outputDir?: string;
  parseErrors: ParseErrorPolicy;
  maxResults: number;
}

export const DEFAULT_TOPOLOGY_PATH = fileURLToPath(
  new URL("../topologies/mixed-big.json", import.meta.url),
);

export function getConfig(): FlowgenConfig {
  const topologyPath = process.env.FLOWGEN_TOPOLOGY ?? DEFAULT_TOPOLOGY_PATH;
  const datasetDir = process.env.FLOWGEN_DATASET_DIR || undefined;
  const outputDir = process.env.FLOWGEN_OUTPUT_DIR || undefined;
  const parseErrors = process.env.FLOWGEN_PARSE_ERRORS ?? "abort";
  const maxResults = parseInt(process.env.FLOWGEN_MAX_RESULTS ?? "10", 10);

  if (parseErrors !== "abort" && parseErrors !== "skip") {
    throw new ConfigurationError(
      `Invalid FLOWGEN_PARSE_ERRORS: "${parseErrors}". Must be "abort" or "skip".`,
    );
  }

  if (isNaN(maxResults) || maxResults < 1) {
    throw new ConfigurationError(
      `Invalid FLOWGEN_MAX_RESULTS: "${process.env.FLOWGEN_MAX_RESULTS}". Must be a positive integer.`,
    );
  }

  return { topologyPath, datasetDir, outputDir, parseErrors, maxResults };
}
