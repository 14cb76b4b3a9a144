import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { FlowgenConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { findVantagePoint, loadTopology } from "../topology/index.js";
import { externalAddress, internalAddress } from "../synth/anonymizer.js";
import { listAttackers } from "../synth/attackers.js";

export function registerAddressTools(
  server: McpServer,
  config: FlowgenConfig,
): void {
  server.tool(
    "flowgen_anonymize_address",
    "Show how an address from the noise dataset is rewritten at each vantage point. Internal hosts move under the vantage point's prefix; external hosts get a different public address per vantage point.",
    {
      address: z.string().describe("Address as it appears in the noise dataset"),
      side: z.enum(["internal", "external"]).describe("Whether the address is the monitored-network side or the remote side of the flow"),
      vantagePoint: z.string().optional().describe("Vantage point name (default: all)"),
      topologyPath: z.string().optional().describe("Topology JSON file (default: the configured topology)"),
    },
    async (params) => {
      try {
        const topology = await loadTopology(params.topologyPath ?? config.topologyPath);
        const targets = params.vantagePoint
          ? [findVantagePoint(topology, params.vantagePoint)]
          : topology.vantagePoints;
        const rewrite = params.side === "internal" ? internalAddress : externalAddress;

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify({
              address: params.address,
              side: params.side,
              rewritten: targets.map((vp) => ({
                vantagePoint: vp.name,
                address: rewrite(params.address, vp),
              })),
            }, null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Error anonymizing address: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );

  server.tool(
    "flowgen_attacker_addresses",
    "Ground-truth labels for a topology: every synthetic amplifier and bot address per vantage point, and the victim address.",
    {
      topologyPath: z.string().optional().describe("Topology JSON file (default: the configured topology)"),
    },
    async (params) => {
      try {
        const topology = await loadTopology(params.topologyPath ?? config.topologyPath);

        return {
          content: [{
            type: "text" as const,
            text: JSON.stringify(listAttackers(topology), null, 2),
          }],
        };
      } catch (error) {
        return {
          content: [{ type: "text" as const, text: `Error listing attackers: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    },
  );
}
