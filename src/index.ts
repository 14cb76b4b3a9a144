#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getConfig } from "./config.js";
import { registerGenerateTools } from "./tools/generate.js";
import { registerAddressTools } from "./tools/addresses.js";
import { registerOutputTools } from "./tools/output.js";
import { registerResources } from "./resources.js";
import { registerPrompts } from "./prompts.js";

const server = new McpServer({
  name: "ddos-flowgen-mcp",
  version: "1.0.0",
  description:
    "MCP server that synthesizes labeled multi-vantage-point DDoS flow datasets from background flow logs",
});

const config = getConfig();

registerGenerateTools(server, config);
registerAddressTools(server, config);
registerOutputTools(server, config);

registerResources(server, config);
registerPrompts(server);

const transport = new StdioServerTransport();
await server.connect(transport);
