import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { FlowgenConfig } from "../config.js";
import { DIRECTIONS } from "../types.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { loadTopology, validateTopology } from "../topology/index.js";
import { FlowOrchestrator, generateDataset, memorySinks } from "../pipeline/index.js";

export function registerGenerateTools(
  server: McpServer,
  config: FlowgenConfig,
): void {
  server.tool(
    "flowgen_generate",
    "Generate a labeled DDoS flow dataset: read the inbound/outbound noise flow logs of a dataset directory, anonymize them per vantage point, layer amplifier, bot, victim and probe flows on top, and write one inbound and one outbound log per vantage point into a new output directory.",
    {
      datasetDir: z.string().optional().describe("Directory containing the 'inbound' and 'outbound' noise logs (default: FLOWGEN_DATASET_DIR)"),
      outputDir: z.string().optional().describe("Directory to create for the results; must not exist (default: FLOWGEN_OUTPUT_DIR)"),
      topologyPath: z.string().optional().describe("Topology JSON file (default: FLOWGEN_TOPOLOGY or the bundled mixed-big topology)"),
      parseErrors: z.enum(["abort", "skip"]).optional().describe("What to do with malformed noise lines (default: abort)"),
    },
    async (params) => {
      try {
        const datasetDir = params.datasetDir ?? config.datasetDir;
        const outputDir = params.outputDir ?? config.outputDir;
        if (!datasetDir) {
          throw new ConfigurationError(
            "A dataset directory is required (datasetDir or FLOWGEN_DATASET_DIR). It must contain files: inbound, outbound",
          );
        }
        if (!outputDir) {
          throw new ConfigurationError(
            "An output directory is required (outputDir or FLOWGEN_OUTPUT_DIR) to store the generated flow logs",
          );
        }

        const topology = await loadTopology(params.topologyPath ?? config.topologyPath);
        const result = await generateDataset({
          datasetDir,
          outputDir,
          topology,
          parseErrors: params.parseErrors ?? config.parseErrors,
          log: (message) => console.error(message),
        });

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify(result, null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Error generating dataset: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );

  server.tool(
    "flowgen_validate_topology",
    "Load and validate a topology file: schema, unique vantage point names, a single victim that hosts no attackers, and a victim present whenever attackers are.",
    {
      topologyPath: z.string().optional().describe("Topology JSON file (default: the configured topology)"),
    },
    async (params) => {
      try {
        const topologyPath = params.topologyPath ?? config.topologyPath;
        const topology = await loadTopology(topologyPath);
        const victim = validateTopology(topology);

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify({
              valid: true,
              topologyPath,
              victim: victim ? { vantagePoint: victim.name, address: victim.victimAddress } : null,
              vantagePoints: topology.vantagePoints,
              amplifiersPerNode: topology.amplifiersPerNode,
              botsPerNode: topology.botsPerNode,
              syntheticInterval: topology.syntheticInterval,
              probesEnabled: topology.probes.enabled,
            }, null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Invalid topology: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );

  server.tool(
    "flowgen_preview",
    "Run the generator on a few noise lines for one direction without touching the filesystem, and return the lines each vantage point's output would receive.",
    {
      lines: z.array(z.string()).min(1).max(1000).describe("Noise flow lines in the pipe-delimited flow-dump format"),
      direction: z.enum(["inbound", "outbound"]).describe("Which noise log the lines come from"),
      topologyPath: z.string().optional().describe("Topology JSON file (default: the configured topology)"),
      parseErrors: z.enum(["abort", "skip"]).optional().describe("What to do with malformed lines (default: FLOWGEN_PARSE_ERRORS, abort)"),
    },
    async (params) => {
      try {
        const topology = await loadTopology(params.topologyPath ?? config.topologyPath);
        const sinks = memorySinks(topology);
        const messages: string[] = [];
        const orchestrator = new FlowOrchestrator(topology, sinks, {
          parseErrors: params.parseErrors ?? config.parseErrors,
          log: (message) => messages.push(message),
        });
        const stats = await orchestrator.processDirection(params.lines, params.direction);

        const outputs = Object.fromEntries(
          [...sinks.entries()].map(([name, pair]) => [
            name,
            Object.fromEntries(
              DIRECTIONS.map((direction) => [
                direction,
                pair[direction].lines.map((line) => line.replace(/\n$/, "")),
              ]),
            ),
          ]),
        );

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify({ stats, messages, outputs }, null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Error previewing: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );
}
