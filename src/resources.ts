import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FlowgenConfig } from "./config.js";
import { FIELD_WIDTHS, FLOW_FIELD_DEFINITIONS } from "./types.js";
import { FIELD_DELIMITER } from "./parser/record.js";
import { loadTopology } from "./topology/index.js";

export function registerResources(server: McpServer, config: FlowgenConfig): void {
  server.resource(
    "record-format",
    "flowgen://record-format",
    {
      description: "Field order, column names and output widths of the flow record format read and written by the generator",
      mimeType: "application/json",
    },
    async () => {
      const format = {
        delimiter: FIELD_DELIMITER,
        trailingDelimiter: true,
        timestampFormat: "YYYY/MM/DDTHH:MM:SS.mmm (UTC)",
        fields: FLOW_FIELD_DEFINITIONS.map((f) => ({
          name: f.name,
          column: f.column,
          width: FIELD_WIDTHS[f.name] || "unpadded",
          description: f.description,
        })),
      };

      return {
        contents: [
          {
            uri: "flowgen://record-format",
            mimeType: "application/json",
            text: JSON.stringify(format, null, 2),
          },
        ],
      };
    },
  );

  server.resource(
    "topology",
    "flowgen://topology",
    {
      description: "The configured attack topology: vantage points, attacker counts and flow parameters",
      mimeType: "application/json",
    },
    async () => {
      const topology = await loadTopology(config.topologyPath);

      return {
        contents: [
          {
            uri: "flowgen://topology",
            mimeType: "application/json",
            text: JSON.stringify({ path: config.topologyPath, topology }, null, 2),
          },
        ],
      };
    },
  );
}
