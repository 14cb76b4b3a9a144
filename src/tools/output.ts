import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { FlowgenConfig } from "../config.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { loadTopology } from "../topology/index.js";
import { summarizeOutput } from "../analytics/summary.js";

export function registerOutputTools(
  server: McpServer,
  config: FlowgenConfig,
): void {
  server.tool(
    "flowgen_summarize_output",
    "Summarize a generated dataset per vantage point and direction: flow, packet and byte totals, protocol mix, top talkers, source-address entropy, and how many flows touch labeled amplifier, bot, victim or probe traffic.",
    {
      outputDir: z.string().optional().describe("Generated output directory (default: FLOWGEN_OUTPUT_DIR)"),
      topologyPath: z.string().optional().describe("Topology the dataset was generated with (default: the configured topology)"),
      top: z.number().int().min(1).max(100).optional().describe("Entries in each top-N list (default: FLOWGEN_MAX_RESULTS)"),
    },
    async (params) => {
      try {
        const outputDir = params.outputDir ?? config.outputDir;
        if (!outputDir) {
          throw new ConfigurationError("An output directory is required (outputDir or FLOWGEN_OUTPUT_DIR)");
        }

        const topology = await loadTopology(params.topologyPath ?? config.topologyPath);
        const files = await summarizeOutput(outputDir, topology, params.top ?? config.maxResults);

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify({ outputDir, files }, null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Error summarizing output: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );
}
